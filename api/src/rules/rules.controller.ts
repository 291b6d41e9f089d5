// api/src/rules/rules.controller.ts
import { Body, Controller, HttpCode, Logger, Post } from '@nestjs/common';
import { ParseRuleDto } from './dto/parse-rule.dto';
import { ParsedRule, RuleParserService } from './rule-parser.service';
import { toRuleHttpError } from './rules.http';

@Controller('rules')
export class RulesController {
  private readonly logger = new Logger(RulesController.name);

  constructor(private readonly parser: RuleParserService) {}

  /**
   * POST /rules/parse
   * Body: { rule: string, strict?: boolean }
   * Returns the predicate tree, the recognized clauses and any warnings.
   */
  @Post('parse')
  @HttpCode(200)
  parse(@Body() body: ParseRuleDto): ParsedRule {
    try {
      return this.parser.parse(body.rule, { strict: body.strict });
    } catch (error) {
      const mapped = toRuleHttpError(error);
      if (mapped) {
        this.logger.warn(`Rejected rule "${body.rule}": ${mapped.message}`);
        throw mapped;
      }
      throw error;
    }
  }
}
