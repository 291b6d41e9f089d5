import { Module } from '@nestjs/common';
import { RuleParserService } from './rule-parser.service';
import { RulesController } from './rules.controller';

@Module({
  controllers: [RulesController],
  providers: [RuleParserService],
  exports: [RuleParserService],
})
export class RulesModule {}
