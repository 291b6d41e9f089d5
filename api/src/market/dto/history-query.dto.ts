import { IsOptional, IsString, Matches } from 'class-validator';
import { Transform } from 'class-transformer';

export const SYMBOL_PATTERN = /^[A-Z0-9.\-]{1,12}$/;
export const SYMBOL_MESSAGE =
  'Symbol must be 1-12 characters: letters, digits, dots, or hyphens';
export const ISO_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const ISO_DAY_MESSAGE = 'Dates must be formatted YYYY-MM-DD';

const upper = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

/**
 * Optional date window shared by history and indicator queries
 */
export class DateWindowQueryDto {
  @IsOptional()
  @Matches(ISO_DAY_PATTERN, { message: ISO_DAY_MESSAGE })
  start?: string;

  @IsOptional()
  @Matches(ISO_DAY_PATTERN, { message: ISO_DAY_MESSAGE })
  end?: string;
}

/**
 * DTO for daily history query parameters
 */
export class HistoryQueryDto extends DateWindowQueryDto {
  @IsString()
  @Transform(upper) // Auto-uppercase for consistency
  @Matches(SYMBOL_PATTERN, { message: SYMBOL_MESSAGE })
  symbol!: string;
}

/**
 * Route parameter holding one symbol
 */
export class SymbolParamDto {
  @IsString()
  @Transform(upper)
  @Matches(SYMBOL_PATTERN, { message: SYMBOL_MESSAGE })
  symbol!: string;
}
