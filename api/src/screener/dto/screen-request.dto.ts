import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { Transform } from 'class-transformer';
import {
  ISO_DAY_MESSAGE,
  ISO_DAY_PATTERN,
  SYMBOL_MESSAGE,
  SYMBOL_PATTERN,
} from '../../market/dto/history-query.dto';

const upperAll = ({ value }: { value: unknown }) =>
  Array.isArray(value)
    ? value.map((v: unknown) => (typeof v === 'string' ? v.trim().toUpperCase() : v))
    : value;

/**
 * Body of POST /screener/run. Exactly one of `rule` (text) or `predicate` (a saved tree).
 */
export class ScreenRequestDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  rule?: string;

  @IsOptional()
  @IsObject()
  predicate?: Record<string, unknown>;

  @IsOptional()
  @IsBoolean()
  strict?: boolean;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(1000)
  @Transform(upperAll)
  @Matches(SYMBOL_PATTERN, { each: true, message: SYMBOL_MESSAGE })
  symbols?: string[];

  @IsOptional()
  @IsString()
  sortBy?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;

  @IsOptional()
  @Matches(ISO_DAY_PATTERN, { message: ISO_DAY_MESSAGE })
  startDate?: string;

  @IsOptional()
  @Matches(ISO_DAY_PATTERN, { message: ISO_DAY_MESSAGE })
  endDate?: string;

  @IsOptional()
  @IsBoolean()
  includeFailed?: boolean;
}
