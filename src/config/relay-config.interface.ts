import { Rule } from '../rules/interfaces/rule.interface';
import { PriorityOrder } from '../rules/priority';

export interface RelayConfig {
  discordToken: string;
  pushoverAppKey: string;
  logLevel: string;
  priorityOrder: PriorityOrder;
  rules: Rule[];
}
