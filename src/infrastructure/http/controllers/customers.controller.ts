import { Body, Controller, Get, Inject, Param, Post, UseGuards } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiConflictResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { CustomerOutputDto } from '@application/dtos';
import { IManagePeoplePort } from '@application/ports/inbound';
import { Roles } from '../decorators';
import { RegisterCustomerRequestDto } from '../dtos/request';
import { JwtAuthGuard, RolesGuard } from '../guards';
import { ApiResponse as Envelope, ok, unwrap } from '../responses';

@ApiTags('Customers')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('admin', 'barista')
@Controller('api/v1/customers')
export class CustomersController {
  constructor(
    @Inject('ManagePeopleUseCase')
    private readonly managePeople: IManagePeoplePort,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List customers' })
  async list(): Promise<Envelope<CustomerOutputDto[]>> {
    return ok(unwrap(await this.managePeople.listCustomers()));
  }

  @Post()
  @ApiOperation({
    summary: 'Register a walk-in customer',
    description: 'Creates a customer profile without a user account.',
  })
  @ApiConflictResponse({ description: 'Email already registered' })
  async register(@Body() body: RegisterCustomerRequestDto): Promise<Envelope<CustomerOutputDto>> {
    return ok(unwrap(await this.managePeople.registerCustomer(body)), 'Customer registered');
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get customer by ID' })
  @ApiParam({ name: 'id', description: 'Customer ID' })
  @ApiNotFoundResponse({ description: 'Customer not found' })
  async get(@Param('id') id: string): Promise<Envelope<CustomerOutputDto>> {
    return ok(unwrap(await this.managePeople.getCustomer(id)));
  }
}
