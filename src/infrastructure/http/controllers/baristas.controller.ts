import {
  Body,
  Controller,
  Get,
  Inject,
  Logger,
  Param,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiConflictResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { BaristaOutputDto } from '@application/dtos';
import { IManagePeoplePort } from '@application/ports/inbound';
import { Roles } from '../decorators';
import {
  CreateBaristaRequestDto,
  ListBaristasQueryDto,
  SetBaristaActiveRequestDto,
} from '../dtos/request';
import { JwtAuthGuard, RolesGuard } from '../guards';
import { ApiResponse as Envelope, ok, unwrap } from '../responses';

@ApiTags('Baristas')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Controller('api/v1/baristas')
export class BaristasController {
  private readonly logger = new Logger(BaristasController.name);

  constructor(
    @Inject('ManagePeopleUseCase')
    private readonly managePeople: IManagePeoplePort,
  ) {}

  @Get()
  @Roles('admin', 'barista')
  @ApiOperation({ summary: 'List baristas' })
  async list(@Query() query: ListBaristasQueryDto): Promise<Envelope<BaristaOutputDto[]>> {
    return ok(unwrap(await this.managePeople.listBaristas({ activeOnly: query.activeOnly })));
  }

  @Post()
  @Roles('admin')
  @ApiOperation({ summary: 'Create the barista profile for a user account' })
  @ApiNotFoundResponse({ description: 'User not found' })
  @ApiConflictResponse({ description: 'The user already has a barista profile' })
  async create(@Body() body: CreateBaristaRequestDto): Promise<Envelope<BaristaOutputDto>> {
    const barista = unwrap(await this.managePeople.createBarista(body));
    this.logger.log(`Barista created: ${barista.id} for user ${barista.userId}`);
    return ok(barista, 'Barista created');
  }

  @Patch(':id/active')
  @Roles('admin')
  @ApiOperation({ summary: 'Activate or deactivate a barista' })
  @ApiParam({ name: 'id', description: 'Barista ID' })
  @ApiNotFoundResponse({ description: 'Barista not found' })
  async setActive(
    @Param('id') id: string,
    @Body() body: SetBaristaActiveRequestDto,
  ): Promise<Envelope<BaristaOutputDto>> {
    return ok(
      unwrap(await this.managePeople.setBaristaActive({ baristaId: id, isActive: body.isActive })),
    );
  }
}
