import { IsBoolean, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

/**
 * Body of POST /rules/parse
 */
export class ParseRuleDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  rule!: string;

  @IsOptional()
  @IsBoolean()
  strict?: boolean;
}
