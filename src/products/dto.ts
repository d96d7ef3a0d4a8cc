// src/products/dto.ts
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { Transform, TransformFnParams, Type } from 'class-transformer';
import { PartialType } from '@nestjs/mapped-types';

const toTrimOrUndef = ({ value }: TransformFnParams) => {
  if (typeof value !== 'string') return value;
  const v = value.trim();
  return v === '' ? undefined : v;
};

export class CreateProductDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100, { message: 'name admite hasta 100 caracteres.' })
  @Transform(toTrimOrUndef)
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(500, { message: 'description admite hasta 500 caracteres.' })
  description?: string | null;

  @Type(() => Number)
  @IsNumber({ maxDecimalPlaces: 2 }, { message: 'price debe ser numérico con hasta 2 decimales.' })
  @Min(0, { message: 'price no puede ser negativo.' })
  price!: number;

  @IsString()
  @IsNotEmpty()
  @Transform(toTrimOrUndef)
  category!: string;

  @Type(() => Number)
  @IsInt({ message: 'stockQuantity debe ser un entero.' })
  @Min(0, { message: 'stockQuantity no puede ser negativo.' })
  stockQuantity!: number;

  @IsOptional()
  @IsBoolean()
  available?: boolean;
}

export class UpdateProductDto extends PartialType(CreateProductDto) {}

// ---------- query strings ----------

export class PriceRangeQueryDto {
  @IsString()
  @IsNotEmpty()
  category!: string;

  @Type(() => Number)
  @IsNumber()
  minPrice!: number;

  @Type(() => Number)
  @IsNumber()
  maxPrice!: number;
}

export class LowStockQueryDto {
  @IsString()
  @IsNotEmpty()
  category!: string;

  @Type(() => Number)
  @IsInt()
  threshold!: number;
}

export class TopSellingQueryDto {
  @IsString()
  @IsNotEmpty()
  category!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  page: number = 0;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  size: number = 10;
}

export class NameSearchQueryDto {
  @IsString()
  name!: string;
}

export class PatternQueryDto {
  @IsString()
  pattern!: string;
}
