import {
  Body,
  Controller,
  Get,
  Inject,
  Logger,
  Param,
  Patch,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiConflictResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { CategoryOutputDto, CoffeeItemOutputDto } from '@application/dtos';
import { IManageMenuPort } from '@application/ports/inbound';
import { Roles } from '../decorators';
import {
  ChangePriceRequestDto,
  CreateCategoryRequestDto,
  CreateCoffeeItemRequestDto,
  ListCoffeeItemsQueryDto,
  SetAvailabilityRequestDto,
  UpdateCoffeeItemRequestDto,
} from '../dtos/request';
import { JwtAuthGuard, RolesGuard } from '../guards';
import { ApiResponse as Envelope, ok, unwrap } from '../responses';

/**
 * Menu browsing is public; changes need staff roles.
 */
@ApiTags('Menu')
@Controller('api/v1/menu')
export class MenuController {
  private readonly logger = new Logger(MenuController.name);

  constructor(
    @Inject('ManageMenuUseCase')
    private readonly manageMenu: IManageMenuPort,
  ) {}

  @Get('items')
  @ApiOperation({
    summary: 'List menu items',
    description: 'Items sorted by name. Unavailable items are hidden unless includeUnavailable=true.',
  })
  @ApiResponse({ status: 200, description: 'Menu items' })
  async listItems(
    @Query() query: ListCoffeeItemsQueryDto,
  ): Promise<Envelope<CoffeeItemOutputDto[]>> {
    return ok(
      unwrap(
        await this.manageMenu.listCoffeeItems({
          includeUnavailable: query.includeUnavailable,
          categoryId: query.categoryId,
        }),
      ),
    );
  }

  @Get('items/:id')
  @ApiOperation({ summary: 'Get a menu item' })
  @ApiParam({
    name: 'id',
    description: 'Coffee item ID',
    example: 'itm_5b0f4c1e-2a3d-4e5f-8a9b-0c1d2e3f4a5b',
  })
  @ApiNotFoundResponse({ description: 'Coffee item not found' })
  async getItem(@Param('id') id: string): Promise<Envelope<CoffeeItemOutputDto>> {
    return ok(unwrap(await this.manageMenu.getCoffeeItem(id)));
  }

  @Post('items')
  @UseGuards(JwtAuthGuard, RolesGuard)
  @Roles('admin')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Add a menu item' })
  @ApiResponse({ status: 201, description: 'Coffee item created' })
  @ApiConflictResponse({ description: 'An item with this name already exists' })
  @ApiForbiddenResponse({ description: 'Admin role required' })
  async createItem(
    @Body() body: CreateCoffeeItemRequestDto,
  ): Promise<Envelope<CoffeeItemOutputDto>> {
    const item = unwrap(await this.manageMenu.createCoffeeItem(body));
    this.logger.log(`Coffee item created: ${item.id} (${item.name})`);
    return ok(item, 'Coffee item created');
  }

  @Put('items/:id')
  @UseGuards(JwtAuthGuard, RolesGuard)
  @Roles('admin')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Update a menu item' })
  @ApiParam({ name: 'id', description: 'Coffee item ID' })
  @ApiNotFoundResponse({ description: 'Coffee item or category not found' })
  @ApiBadRequestResponse({ description: 'Invalid item details' })
  async updateItem(
    @Param('id') id: string,
    @Body() body: UpdateCoffeeItemRequestDto,
  ): Promise<Envelope<CoffeeItemOutputDto>> {
    return ok(unwrap(await this.manageMenu.updateCoffeeItem({ ...body, coffeeItemId: id })));
  }

  @Patch('items/:id/price')
  @UseGuards(JwtAuthGuard, RolesGuard)
  @Roles('admin', 'barista')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Change the price of a menu item' })
  @ApiParam({ name: 'id', description: 'Coffee item ID' })
  @ApiNotFoundResponse({ description: 'Coffee item not found' })
  async changePrice(
    @Param('id') id: string,
    @Body() body: ChangePriceRequestDto,
  ): Promise<Envelope<CoffeeItemOutputDto>> {
    const item = unwrap(await this.manageMenu.changePrice({ coffeeItemId: id, price: body.price }));
    this.logger.log(`Price of ${id} is now ${item.price} ${item.currency}`);
    return ok(item);
  }

  @Patch('items/:id/availability')
  @UseGuards(JwtAuthGuard, RolesGuard)
  @Roles('admin', 'barista')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Put a menu item on or off the menu' })
  @ApiParam({ name: 'id', description: 'Coffee item ID' })
  @ApiNotFoundResponse({ description: 'Coffee item not found' })
  async setAvailability(
    @Param('id') id: string,
    @Body() body: SetAvailabilityRequestDto,
  ): Promise<Envelope<CoffeeItemOutputDto>> {
    return ok(
      unwrap(
        await this.manageMenu.setAvailability({ coffeeItemId: id, isAvailable: body.isAvailable }),
      ),
    );
  }

  @Get('categories')
  @ApiOperation({ summary: 'List categories' })
  async listCategories(): Promise<Envelope<CategoryOutputDto[]>> {
    return ok(unwrap(await this.manageMenu.listCategories()));
  }

  @Post('categories')
  @UseGuards(JwtAuthGuard, RolesGuard)
  @Roles('admin')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Create a category' })
  @ApiResponse({ status: 201, description: 'Category created' })
  @ApiConflictResponse({ description: 'A category with this name already exists' })
  async createCategory(
    @Body() body: CreateCategoryRequestDto,
  ): Promise<Envelope<CategoryOutputDto>> {
    return ok(unwrap(await this.manageMenu.createCategory(body)), 'Category created');
  }
}
