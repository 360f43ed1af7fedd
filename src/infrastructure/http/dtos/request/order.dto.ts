import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ORDER_STATUS_VALUES } from '@domain/value-objects';

export class OrderItemRequestDto {
  @ApiProperty({ example: 'itm_5b0f4c1e-2a3d-4e5f-8a9b-0c1d2e3f4a5b' })
  @IsString({ message: 'Coffee item ID must be a string' })
  @IsNotEmpty({ message: 'Coffee item ID cannot be empty' })
  coffeeItemId!: string;

  @ApiProperty({ example: 2, minimum: 1, maximum: 10 })
  @IsInt({ message: 'Quantity must be a whole number' })
  @Min(1, { message: 'Quantity must be at least 1' })
  @Max(10, { message: 'Quantity cannot exceed 10' })
  quantity!: number;

  @ApiPropertyOptional({ example: 'extra hot, oat milk' })
  @IsOptional()
  @IsString({ message: 'Special instructions must be a string' })
  @MaxLength(200, { message: 'Special instructions cannot exceed 200 characters' })
  specialInstructions?: string;
}

/**
 * Body for placing an order. Prices come from the menu, never from the client.
 */
export class CreateOrderRequestDto {
  @ApiProperty({ example: 'cus_7c2d9e4f-1a2b-4c3d-8e9f-0a1b2c3d4e5f' })
  @IsString({ message: 'Customer ID must be a string' })
  @IsNotEmpty({ message: 'Customer ID cannot be empty' })
  customerId!: string;

  @ApiProperty({ type: [OrderItemRequestDto] })
  @IsArray({ message: 'Items must be an array' })
  @ArrayNotEmpty({ message: 'Order must contain at least one item' })
  @ValidateNested({ each: true })
  @Type(() => OrderItemRequestDto)
  items!: OrderItemRequestDto[];

  @ApiPropertyOptional({ example: 'Pick up at the side window' })
  @IsOptional()
  @IsString({ message: 'Notes must be a string' })
  @MaxLength(1000, { message: 'Notes cannot exceed 1000 characters' })
  notes?: string;
}

export class ListOrdersQueryDto {
  @ApiPropertyOptional({ enum: ORDER_STATUS_VALUES })
  @IsOptional()
  @IsIn(ORDER_STATUS_VALUES, {
    message: `Status must be one of: ${ORDER_STATUS_VALUES.join(', ')}`,
  })
  status?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  customerId?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  baristaId?: string;
}

export class AssignBaristaRequestDto {
  @ApiProperty({ example: 'bar_1e2d3c4b-5a69-4788-9a0b-1c2d3e4f5a6b' })
  @IsString({ message: 'Barista ID must be a string' })
  @IsNotEmpty({ message: 'Barista ID cannot be empty' })
  baristaId!: string;
}

export class ChangeOrderStatusRequestDto {
  @ApiProperty({ enum: ORDER_STATUS_VALUES, example: 'ready' })
  @IsIn(ORDER_STATUS_VALUES, {
    message: `Status must be one of: ${ORDER_STATUS_VALUES.join(', ')}`,
  })
  status!: string;
}

export class CancelOrderRequestDto {
  @ApiPropertyOptional({ example: 'Customer left' })
  @IsOptional()
  @IsString({ message: 'Reason must be a string' })
  @MaxLength(500)
  reason?: string;
}
