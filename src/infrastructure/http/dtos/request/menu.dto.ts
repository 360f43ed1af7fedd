import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import { Transform } from 'class-transformer';

/**
 * Body for creating a menu item. Price is in dollars with at most two decimals.
 */
export class CreateCoffeeItemRequestDto {
  @ApiProperty({ example: 'Flat White' })
  @IsString({ message: 'Name must be a string' })
  @IsNotEmpty({ message: 'Name cannot be empty' })
  @MaxLength(100, { message: 'Name cannot exceed 100 characters' })
  name!: string;

  @ApiProperty({ example: 'Ristretto shots with steamed whole milk' })
  @IsString({ message: 'Description must be a string' })
  @IsNotEmpty({ message: 'Description cannot be empty' })
  @MaxLength(500, { message: 'Description cannot exceed 500 characters' })
  description!: string;

  @ApiProperty({ example: 4.25, minimum: 0.01 })
  @IsNumber({ maxDecimalPlaces: 2 }, { message: 'Price must be a number with at most 2 decimals' })
  @Min(0.01, { message: 'Price must be greater than zero' })
  price!: number;

  @ApiProperty({ example: 'cat_3f1c2a9e-8d7b-4c6a-9e1f-2b3c4d5e6f70' })
  @IsString({ message: 'Category ID must be a string' })
  @IsNotEmpty({ message: 'Category ID cannot be empty' })
  categoryId!: string;

  @ApiPropertyOptional({ example: 'https://cdn.example.com/flat-white.png' })
  @IsOptional()
  @IsString({ message: 'Image URL must be a string' })
  @MaxLength(500)
  imageUrl?: string;
}

export class UpdateCoffeeItemRequestDto {
  @ApiPropertyOptional({ example: 'Flat White' })
  @IsOptional()
  @IsString({ message: 'Name must be a string' })
  @MaxLength(100, { message: 'Name cannot exceed 100 characters' })
  name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString({ message: 'Description must be a string' })
  @MaxLength(500, { message: 'Description cannot exceed 500 characters' })
  description?: string;

  @ApiPropertyOptional({ example: 4.5 })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 }, { message: 'Price must be a number with at most 2 decimals' })
  price?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean({ message: 'isAvailable must be a boolean' })
  isAvailable?: boolean;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString({ message: 'Category ID must be a string' })
  categoryId?: string;

  @ApiPropertyOptional({ nullable: true, description: 'null removes the image' })
  @ValidateIf((_dto, value) => value !== undefined && value !== null)
  @IsString({ message: 'Image URL must be a string' })
  @MaxLength(500)
  imageUrl?: string | null;
}

export class ChangePriceRequestDto {
  @ApiProperty({ example: 4.75 })
  @IsNumber({ maxDecimalPlaces: 2 }, { message: 'Price must be a number with at most 2 decimals' })
  price!: number;
}

export class SetAvailabilityRequestDto {
  @ApiProperty({ example: false })
  @IsBoolean({ message: 'isAvailable must be a boolean' })
  isAvailable!: boolean;
}

export class ListCoffeeItemsQueryDto {
  @ApiPropertyOptional({ default: false, description: 'Include items that are off the menu' })
  @IsOptional()
  @IsBoolean()
  // Reads the raw query value; implicit conversion would turn 'false' into true
  @Transform(({ obj, key }) => obj[key] === true || obj[key] === 'true')
  includeUnavailable?: boolean;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  categoryId?: string;
}

export class CreateCategoryRequestDto {
  @ApiProperty({ example: 'Espresso' })
  @IsString({ message: 'Name must be a string' })
  @IsNotEmpty({ message: 'Name cannot be empty' })
  @MaxLength(100, { message: 'Name cannot exceed 100 characters' })
  name!: string;

  @ApiPropertyOptional({ example: 'Drinks built on espresso shots' })
  @IsOptional()
  @IsString({ message: 'Description must be a string' })
  @MaxLength(500)
  description?: string;
}
