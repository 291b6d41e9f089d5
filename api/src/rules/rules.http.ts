import { BadRequestException } from '@nestjs/common';
import { InvalidPredicateError, RuleParseError, UnknownFieldError } from './rules.errors';

/**
 * Map a rule error to a 400 carrying what the client needs to fix the rule;
 * null for anything else.
 */
export function toRuleHttpError(error: unknown): BadRequestException | null {
  if (error instanceof RuleParseError) {
    return new BadRequestException({
      message: error.message,
      error: error.name,
      unmatched: error.unmatched,
      examples: error.examples,
    });
  }
  if (error instanceof UnknownFieldError) {
    return new BadRequestException({
      message: error.message,
      error: error.name,
      field: error.field,
      known: error.known,
    });
  }
  if (error instanceof InvalidPredicateError) {
    return new BadRequestException({
      message: error.message,
      error: error.name,
      path: error.path,
    });
  }
  return null;
}
