import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RelayConfig } from '../config/relay-config.interface';
import { collectConfigWarnings } from '../config/relay-config.loader';
import { Rule } from './interfaces/rule.interface';
import { PriorityOrder } from './priority';

/**
 * Read-only view of the rule list loaded at startup.
 */
@Injectable()
export class RulesService implements OnModuleInit {
  private readonly logger = new Logger(RulesService.name);

  constructor(private readonly configService: ConfigService) {}

  onModuleInit(): void {
    const config = this.config();
    this.logger.log(
      `Loaded ${config.rules.length} rule(s), priority order ${config.priorityOrder}`,
    );
    for (const warning of collectConfigWarnings(config)) {
      this.logger.warn(warning);
    }
  }

  get rules(): readonly Rule[] {
    return this.config().rules;
  }

  get priorityOrder(): PriorityOrder {
    return this.config().priorityOrder;
  }

  private config(): RelayConfig {
    const config = this.configService.get<RelayConfig>('relay');
    if (!config) {
      throw new Error('Relay configuration is not loaded');
    }
    return config;
  }
}
