import { Transform, TransformFnParams, Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import {
  EmergencyParams,
  Rule,
  RuleActions,
  RuleConditions,
} from '../../rules/interfaces/rule.interface';
import { PRIORITY_ORDERS, PriorityOrder } from '../../rules/priority';
import { RelayConfig } from '../relay-config.interface';

export class EmergencyParamsDto implements EmergencyParams {
  @IsOptional()
  @IsString()
  ackEmoji?: string;

  @IsInt()
  expire = 0;

  @IsInt()
  retry = 0;
}

export class RuleConditionsDto implements RuleConditions {
  @IsOptional()
  @IsString()
  channelId?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  messageHasEmoji?: string[];

  @IsOptional()
  @IsBoolean()
  reactToAtMention?: boolean;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  specificMentions?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  contentIncludes?: string[];
}

export class RuleActionsDto implements RuleActions {
  @IsOptional()
  @IsString()
  pushoverDestination?: string;

  @IsInt()
  priority = 0;

  @IsOptional()
  @IsString()
  reactionEmoji?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => EmergencyParamsDto)
  emergency?: EmergencyParamsDto;
}

export class RuleDto implements Rule {
  @IsOptional()
  @IsString()
  name?: string;

  @ValidateNested()
  @Type(() => RuleConditionsDto)
  @Transform(
    ({ value }: TransformFnParams) => value ?? new RuleConditionsDto(),
  )
  conditions: RuleConditionsDto = new RuleConditionsDto();

  @ValidateNested()
  @Type(() => RuleActionsDto)
  actions: RuleActionsDto = new RuleActionsDto();
}

export class RelayConfigDto implements RelayConfig {
  @IsString()
  @IsNotEmpty({ message: 'discordToken is required' })
  discordToken = '';

  @IsString()
  @IsNotEmpty({ message: 'pushoverAppKey is required' })
  pushoverAppKey = '';

  @IsString()
  logLevel = 'info';

  @IsIn(PRIORITY_ORDERS)
  priorityOrder: PriorityOrder = 'ascending';

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RuleDto)
  rules: RuleDto[] = [];
}
