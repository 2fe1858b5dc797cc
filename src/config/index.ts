import 'reflect-metadata';
import dotenv from 'dotenv';
import path from 'path';
import { plainToInstance, Type } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsPositive,
  IsString,
  IsUrl,
  Max,
  Min,
  ValidateNested,
  validateSync,
  ValidationError,
} from 'class-validator';
import { LABELING_MODES, LabelingMode } from '../models/Paragraph';
import { ConfigError } from '../utils/errors';
import { LogLevel } from '../utils/logger';

// Load environment variables from .env file
dotenv.config();

/**
 * Remote model endpoint and credentials
 */
export class RemoteSettings {
  @IsString()
  apiKey: string = '';

  @IsUrl({ require_tld: false, require_protocol: true, protocols: ['http', 'https'] })
  baseUrl: string = 'https://api.openai.com/v1';

  @IsString()
  @IsNotEmpty()
  model: string = 'gpt-4o';
}

/**
 * Timeouts, in seconds
 */
export class TimeoutSettings {
  @IsNumber()
  @IsPositive()
  baseTimeoutS: number = 60;

  @IsNumber()
  @Min(0)
  perParagraphS: number = 0.5;

  @IsNumber()
  @IsPositive()
  maxTimeoutS: number = 120;

  @IsNumber()
  @IsPositive()
  connectTimeoutS: number = 10;
}

export class RetrySettings {
  @IsInt()
  @Min(1)
  maxAttempts: number = 3;

  @IsNumber()
  @Min(0)
  backoffBaseS: number = 1;
}

/**
 * Thresholds for hybrid triggering and remote label adoption
 */
export class HybridSettings {
  @IsInt()
  @IsPositive()
  headingMaxChars: number = 30;

  @IsInt()
  @IsPositive()
  shortBodyMaxChars: number = 60;

  @IsInt()
  @Min(2)
  shortBodyMinRun: number = 3;

  @IsNumber()
  @Min(0)
  @Max(1)
  confidenceThreshold: number = 0.7;

  @IsNumber()
  @Min(0)
  @Max(1)
  listCandidateMaxConfidence: number = 0.7;
}

export class LoggingSettings {
  @IsEnum(LogLevel)
  level: LogLevel = LogLevel.INFO;
}

export class ReportSettings {
  @IsString()
  @IsNotEmpty()
  outputDir: string = path.join(process.cwd(), 'reports');

  @IsBoolean()
  writeReport: boolean = false;
}

/**
 * Configuration for the application. Built once, validated, then passed by
 * reference to the components that need it.
 */
export class LabelingConfig {
  @IsIn([...LABELING_MODES])
  mode: LabelingMode = 'hybrid';

  @ValidateNested()
  @Type(() => RemoteSettings)
  remote: RemoteSettings = new RemoteSettings();

  @ValidateNested()
  @Type(() => TimeoutSettings)
  timeouts: TimeoutSettings = new TimeoutSettings();

  @ValidateNested()
  @Type(() => RetrySettings)
  retry: RetrySettings = new RetrySettings();

  @ValidateNested()
  @Type(() => HybridSettings)
  hybrid: HybridSettings = new HybridSettings();

  @ValidateNested()
  @Type(() => LoggingSettings)
  logging: LoggingSettings = new LoggingSettings();

  @ValidateNested()
  @Type(() => ReportSettings)
  report: ReportSettings = new ReportSettings();
}

export interface ConfigOverrides {
  mode?: string;
  remote?: Partial<RemoteSettings>;
  timeouts?: Partial<TimeoutSettings>;
  retry?: Partial<RetrySettings>;
  hybrid?: Partial<HybridSettings>;
  logging?: { level?: string };
  report?: Partial<ReportSettings>;
}

/**
 * `llm` is accepted as the historical name of the remote-only mode
 */
export function normalizeMode(value: string): string {
  const mode = value.trim().toLowerCase();
  return mode === 'llm' ? 'remote' : mode;
}

function numberFrom(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

function stringFrom(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function flattenViolations(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap(err => {
    const property = parent ? `${parent}.${err.property}` : err.property;
    const own = Object.values(err.constraints ?? {}).map(message => `${property}: ${message}`);
    return [...own, ...flattenViolations(err.children ?? [], property)];
  });
}

/**
 * Build a validated configuration from defaults plus overrides.
 * Unset or undefined fields keep their defaults.
 * Throws ConfigError listing every violated constraint.
 */
export function buildConfig(overrides: ConfigOverrides = {}): LabelingConfig {
  const plain = {
    ...overrides,
    mode: overrides.mode === undefined ? undefined : normalizeMode(overrides.mode),
  };

  const config = plainToInstance(LabelingConfig, plain, { exposeDefaultValues: true });
  const violations = flattenViolations(validateSync(config));

  if (config.timeouts.maxTimeoutS < config.timeouts.baseTimeoutS) {
    violations.push('timeouts.maxTimeoutS: maxTimeoutS must not be smaller than baseTimeoutS');
  }

  if (violations.length > 0) {
    throw new ConfigError(violations.join('; '), violations);
  }

  return config;
}

/**
 * Load configuration from environment variables and merge with defaults.
 * Explicit overrides win over the environment.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): LabelingConfig {
  const writeReport = stringFrom(env.WRITE_REPORT);

  return buildConfig({
    mode: overrides.mode ?? stringFrom(env.LLM_MODE),
    remote: {
      apiKey: stringFrom(env.LLM_API_KEY),
      baseUrl: stringFrom(env.LLM_BASE_URL),
      model: stringFrom(env.LLM_MODEL),
      ...overrides.remote,
    },
    timeouts: {
      baseTimeoutS: numberFrom(env.LLM_TIMEOUT_S),
      perParagraphS: numberFrom(env.LLM_TIMEOUT_PER_PARAGRAPH_S),
      maxTimeoutS: numberFrom(env.LLM_MAX_TIMEOUT_S),
      connectTimeoutS: numberFrom(env.LLM_CONNECT_TIMEOUT_S),
      ...overrides.timeouts,
    },
    retry: {
      maxAttempts: numberFrom(env.LLM_RETRY_ATTEMPTS),
      backoffBaseS: numberFrom(env.LLM_RETRY_BACKOFF_S),
      ...overrides.retry,
    },
    hybrid: {
      headingMaxChars: numberFrom(env.HYBRID_HEADING_MAX_CHARS),
      shortBodyMaxChars: numberFrom(env.HYBRID_SHORT_BODY_MAX_CHARS),
      shortBodyMinRun: numberFrom(env.HYBRID_SHORT_BODY_MIN_RUN),
      confidenceThreshold: numberFrom(env.HYBRID_CONFIDENCE_THRESHOLD),
      listCandidateMaxConfidence: numberFrom(env.HYBRID_LIST_MAX_CONFIDENCE),
      ...overrides.hybrid,
    },
    logging: {
      level: stringFrom(env.LOG_LEVEL)?.toUpperCase(),
      ...overrides.logging,
    },
    report: {
      outputDir: stringFrom(env.REPORT_DIR),
      writeReport: writeReport === undefined ? undefined : writeReport.toLowerCase() === 'true',
      ...overrides.report,
    },
  });
}

export default loadConfig;
