import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Param,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiConflictResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { OrderOutputDto } from '@application/dtos';
import { ICreateOrderPort, IManageOrderPort } from '@application/ports/inbound';
import { Roles } from '../decorators';
import {
  AssignBaristaRequestDto,
  CancelOrderRequestDto,
  ChangeOrderStatusRequestDto,
  CreateOrderRequestDto,
  ListOrdersQueryDto,
} from '../dtos/request';
import { JwtAuthGuard, RolesGuard } from '../guards';
import { ApiResponse as Envelope, ok, unwrap } from '../responses';

/**
 * Controller for order endpoints.
 *
 * Orders are placed by any signed-in user; moving them through preparation
 * is staff work. A transition the order's status does not allow answers 409.
 */
@ApiTags('Orders')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Controller('api/v1/orders')
export class OrdersController {
  private readonly logger = new Logger(OrdersController.name);

  constructor(
    @Inject('CreateOrderUseCase')
    private readonly createOrder: ICreateOrderPort,
    @Inject('ManageOrderUseCase')
    private readonly manageOrder: IManageOrderPort,
  ) {}

  @Post()
  @ApiOperation({
    summary: 'Place an order',
    description: 'Prices each line from the current menu. The order starts as pending.',
  })
  @ApiResponse({ status: 201, description: 'Order created' })
  @ApiNotFoundResponse({ description: 'Customer or coffee item not found' })
  @ApiBadRequestResponse({ description: 'Invalid order or unavailable item' })
  async create(@Body() body: CreateOrderRequestDto): Promise<Envelope<OrderOutputDto>> {
    const order = unwrap(await this.createOrder.execute(body));
    this.logger.log(`Order created: ${order.id}, total: ${order.totalPrice} ${order.currency}`);
    return ok(order, 'Order created');
  }

  @Get()
  @Roles('admin', 'barista')
  @ApiOperation({ summary: 'List orders', description: 'Newest first. Filters combine.' })
  async list(@Query() query: ListOrdersQueryDto): Promise<Envelope<OrderOutputDto[]>> {
    return ok(
      unwrap(
        await this.manageOrder.listOrders({
          status: query.status,
          customerId: query.customerId,
          baristaId: query.baristaId,
        }),
      ),
    );
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get order by ID' })
  @ApiParam({
    name: 'id',
    description: 'Order ID',
    example: 'ord_4d5e6f7a-8b9c-4d0e-9f1a-2b3c4d5e6f7a',
  })
  @ApiNotFoundResponse({ description: 'Order not found' })
  async get(@Param('id') id: string): Promise<Envelope<OrderOutputDto>> {
    return ok(unwrap(await this.manageOrder.getOrder(id)));
  }

  @Post(':id/assign')
  @HttpCode(HttpStatus.OK)
  @Roles('admin', 'barista')
  @ApiOperation({
    summary: 'Assign a barista',
    description: 'Hands a pending order to an active barista and moves it to in_progress.',
  })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiNotFoundResponse({ description: 'Order or barista not found' })
  @ApiConflictResponse({ description: 'Order is not pending' })
  async assign(
    @Param('id') id: string,
    @Body() body: AssignBaristaRequestDto,
  ): Promise<Envelope<OrderOutputDto>> {
    const order = unwrap(
      await this.manageOrder.assignBarista({ orderId: id, baristaId: body.baristaId }),
    );
    this.logger.log(`Order ${id} assigned to ${body.baristaId}`);
    return ok(order, 'Barista assigned');
  }

  @Patch(':id/status')
  @Roles('admin', 'barista')
  @ApiOperation({ summary: 'Change order status' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiConflictResponse({ description: 'Transition not allowed or order modified concurrently' })
  async changeStatus(
    @Param('id') id: string,
    @Body() body: ChangeOrderStatusRequestDto,
  ): Promise<Envelope<OrderOutputDto>> {
    return ok(unwrap(await this.manageOrder.changeStatus({ orderId: id, status: body.status })));
  }

  @Post(':id/ready')
  @HttpCode(HttpStatus.OK)
  @Roles('admin', 'barista')
  @ApiOperation({ summary: 'Mark an in-progress order as ready for pickup' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiConflictResponse({ description: 'Order is not in progress' })
  async markAsReady(@Param('id') id: string): Promise<Envelope<OrderOutputDto>> {
    return ok(unwrap(await this.manageOrder.markAsReady(id)), 'Order is ready');
  }

  @Post(':id/complete')
  @HttpCode(HttpStatus.OK)
  @Roles('admin', 'barista')
  @ApiOperation({ summary: 'Complete a ready order' })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiConflictResponse({ description: 'Order is not ready' })
  async complete(@Param('id') id: string): Promise<Envelope<OrderOutputDto>> {
    const order = unwrap(await this.manageOrder.complete(id));
    this.logger.log(`Order completed: ${id}`);
    return ok(order, 'Order completed');
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Cancel an order',
    description: 'Any order that is not completed can be cancelled.',
  })
  @ApiParam({ name: 'id', description: 'Order ID' })
  @ApiConflictResponse({ description: 'Order is already completed' })
  async cancel(
    @Param('id') id: string,
    @Body() body: CancelOrderRequestDto,
  ): Promise<Envelope<OrderOutputDto>> {
    const order = unwrap(await this.manageOrder.cancel({ orderId: id, reason: body.reason }));
    this.logger.log(`Order cancelled: ${id}`);
    return ok(order, 'Order cancelled');
  }
}
