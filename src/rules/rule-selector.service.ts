import { Injectable, Logger } from '@nestjs/common';
import { ConditionEvaluator } from './condition-evaluator';
import { Rule, RuleMatch } from './interfaces/rule.interface';
import { MessageSnapshot } from './interfaces/message-snapshot.interface';

export function ruleLabel(rule: Rule, index: number): string {
  return rule.name || `unnamed_rule_${index + 1}`;
}

@Injectable()
export class RuleSelector {
  private readonly logger = new Logger(RuleSelector.name);

  constructor(private readonly evaluator: ConditionEvaluator) {}

  /**
   * First rule, in configured order, whose conditions match the message.
   * Rules after the match are not evaluated.
   */
  select(
    message: MessageSnapshot,
    rules: readonly Rule[],
    botUserId: string | undefined,
  ): RuleMatch | undefined {
    for (const [index, rule] of rules.entries()) {
      const label = ruleLabel(rule, index);
      if (this.evaluator.evaluate(message, rule.conditions, botUserId, label)) {
        this.logger.log(
          `Rule #${index + 1} ('${label}') matched message ${message.id}`,
        );
        return { rule, index };
      }
      this.logger.debug(
        `Rule #${index + 1} ('${label}') did not match message ${message.id}`,
      );
    }

    this.logger.debug(
      `No rules matched message ${message.id} after evaluating ${rules.length} rule(s)`,
    );
    return undefined;
  }
}
