import { Module } from '@nestjs/common';
import { ConditionEvaluator } from './condition-evaluator';
import { RuleSelector } from './rule-selector.service';
import { RulesService } from './rules.service';

@Module({
  providers: [ConditionEvaluator, RuleSelector, RulesService],
  exports: [RuleSelector, RulesService],
})
export class RulesModule {}
