// src/config/dcv.config.ts
import { ConfigService } from '@nestjs/config';
import { plainToInstance, Transform, TransformFnParams, Type } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors/dcv.errors';

export enum DcvCommand {
  CHECK = 'check',
  VALIDATE = 'validate',
  RUNALL = 'runall',
}

const toBoolean = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? ['true', '1', 'yes'].includes(value.toLowerCase()) : value;

export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  DIGICERT_KEY!: string;

  @IsUrl({ require_tld: false })
  DIGICERT_API_BASE = 'https://www.digicert.com/services/v2';

  @IsOptional()
  @IsString()
  NEU_USERNAME?: string;

  @IsOptional()
  @IsString()
  NEU_PASSWORD?: string;

  @IsUrl({ require_tld: false })
  ULTRADNS_API_BASE = 'https://api.ultradns.com';

  @IsEnum(DcvCommand)
  DCV_COMMAND: DcvCommand = DcvCommand.RUNALL;

  @Type(() => Number)
  @IsInt()
  DCV_NUM_DAYS = 90;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  DCV_TIMEOUT = 180;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  DCV_POLL_INTERVAL = 60;

  @IsOptional()
  @IsString()
  DCV_DOMAINS?: string;

  @IsOptional()
  @IsString()
  DCV_DOMAINS_FILE?: string;

  @Transform(toBoolean)
  @IsBoolean()
  DCV_ASSUME_YES = false;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  HTTP_TIMEOUT_MS = 15000;
}

/** Used by ConfigModule.forRoot; throws on the first invalid environment. */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(env);
  if (errors.length > 0) {
    const details = errors
      .map((e) => Object.values(e.constraints ?? {}).join(', '))
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  if (
    env.DCV_COMMAND !== DcvCommand.CHECK &&
    (!env.NEU_USERNAME || !env.NEU_PASSWORD)
  ) {
    throw new ConfigurationError(
      `NEU_USERNAME and NEU_PASSWORD are required for "${env.DCV_COMMAND}".`,
    );
  }
  if (
    env.DCV_COMMAND === DcvCommand.VALIDATE &&
    parseDomainList(env.DCV_DOMAINS).length === 0
  ) {
    throw new ConfigurationError('DCV_DOMAINS is required for "validate".');
  }
  return env;
}

export const DCV_OPTIONS = Symbol('DCV_OPTIONS');

export interface DcvOptions {
  command: DcvCommand;
  caApiBase: string;
  caApiKey: string;
  dnsApiBase: string;
  dnsUsername: string;
  dnsPassword: string;
  horizonDays: number;
  timeoutSeconds: number;
  pollIntervalSeconds: number;
  domainNames: string[];
  domainsFile?: string;
  assumeYes: boolean;
  httpTimeoutMs: number;
}

export function parseDomainList(raw?: string): string[] {
  const names = (raw ?? '')
    .split(',')
    .map((n) => n.trim().toLowerCase().replace(/\.$/, ''))
    .filter(Boolean);
  return [...new Set(names)];
}

export function buildDcvOptions(
  config: ConfigService<EnvironmentVariables, true>,
): DcvOptions {
  return {
    command: config.get('DCV_COMMAND', { infer: true }),
    caApiBase: config.get('DIGICERT_API_BASE', { infer: true }),
    caApiKey: config.get('DIGICERT_KEY', { infer: true }),
    dnsApiBase: config.get('ULTRADNS_API_BASE', { infer: true }),
    dnsUsername: config.get('NEU_USERNAME', { infer: true }) ?? '',
    dnsPassword: config.get('NEU_PASSWORD', { infer: true }) ?? '',
    horizonDays: config.get('DCV_NUM_DAYS', { infer: true }),
    timeoutSeconds: config.get('DCV_TIMEOUT', { infer: true }),
    pollIntervalSeconds: config.get('DCV_POLL_INTERVAL', { infer: true }),
    domainNames: parseDomainList(config.get('DCV_DOMAINS', { infer: true })),
    domainsFile: config.get('DCV_DOMAINS_FILE', { infer: true }) || undefined,
    assumeYes: config.get('DCV_ASSUME_YES', { infer: true }),
    httpTimeoutMs: config.get('HTTP_TIMEOUT_MS', { infer: true }),
  };
}
