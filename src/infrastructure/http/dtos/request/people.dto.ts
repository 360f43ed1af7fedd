import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsEmail, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';

export class RegisterCustomerRequestDto {
  @ApiProperty({ example: 'Walk-in Guest' })
  @IsString({ message: 'Name must be a string' })
  @IsNotEmpty({ message: 'Name cannot be empty' })
  @MaxLength(100, { message: 'Name cannot exceed 100 characters' })
  name!: string;

  @ApiProperty({ example: 'guest@example.com' })
  @IsEmail({}, { message: 'Email must be a valid email address' })
  email!: string;

  @ApiPropertyOptional({ example: '+1 555 0101' })
  @IsOptional()
  @IsString()
  @MaxLength(20)
  phone?: string;

  @ApiPropertyOptional({ example: '12 Market St' })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  address?: string;
}

export class CreateBaristaRequestDto {
  @ApiProperty({ example: 'usr_0a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d' })
  @IsString({ message: 'User ID must be a string' })
  @IsNotEmpty({ message: 'User ID cannot be empty' })
  userId!: string;

  @ApiProperty({ example: 'Marco' })
  @IsString({ message: 'Name must be a string' })
  @IsNotEmpty({ message: 'Name cannot be empty' })
  @MaxLength(100, { message: 'Name cannot exceed 100 characters' })
  name!: string;
}

export class SetBaristaActiveRequestDto {
  @ApiProperty({ example: false })
  @IsBoolean({ message: 'isActive must be a boolean' })
  isActive!: boolean;
}

export class ListBaristasQueryDto {
  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  @Transform(({ obj, key }) => obj[key] === true || obj[key] === 'true')
  activeOnly?: boolean;
}
