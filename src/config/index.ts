/**
 * CloudWatch Logs Handler Configuration Module
 *
 * Provides configuration types, validation, a fluent builder and
 * environment loading for {@link CloudWatchLogsHandler}.
 *
 * @module config
 */

import { z } from 'zod';

import { DEFAULT_TRUNCATION_SUFFIX, validateCapacity } from '../batch/config.js';
import { ConfigurationError } from '../error/index.js';
import { PatternFormatter, type Formatter } from '../formatting/formatter.js';
import { ConsoleLogger, NoopLogger, type DiagnosticLevel, type Logger } from '../observability/logging.js';
import type { SdkClientOptions, SdkCredentials } from '../remote/sdk.js';
import { LOG_LEVELS, type LogLevel } from '../types/record.js';
import { VALID_RETENTION_DAYS, isRetentionDays, type RetentionDays } from '../types/retention.js';

/**
 * What happens to the buffered batch when the service rejects events.
 *
 * - `retain`: keep the batch buffered so the caller can retry it
 * - `drop`: discard the batch; the rejection is still raised
 */
export type RejectPolicy = 'retain' | 'drop';

/**
 * Handler options as supplied by the caller.
 *
 * @example
 * ```typescript
 * const options: HandlerOptions = {
 *   logGroup: 'my-service',
 *   capacity: 100,
 *   retainDays: 30,
 *   formatter: new PatternFormatter('{timestamp} - {name} - {level} - {message}'),
 * };
 * ```
 */
export interface HandlerOptions {
  /** Log group name; created at construction if missing */
  logGroup: string;
  /** Fixed log stream name; the current local date (YYYY-MM-DD) is used when absent */
  logStream?: string;
  /**
   * Maximum number of buffered events (0 ... 10000).
   * @default 10
   */
  capacity?: number;
  /** Retention applied to the log group if this handler creates it */
  retainDays?: number;
  /**
   * Records below this level are ignored.
   * @default 'trace'
   */
  level?: LogLevel;
  /**
   * @default 'retain'
   */
  rejectPolicy?: RejectPolicy;
  /**
   * Appended to messages truncated to fit in a batch.
   * @default ' ...'
   */
  truncationSuffix?: string;
  /** Renders records to text; defaults to the bare message */
  formatter?: Formatter;
  /** Receives the handler's own diagnostics; silent by default */
  logger?: Logger;
  /** Source of the current date for daily stream names */
  clock?: () => Date;
  /** AWS SDK client options, used when no client is injected */
  aws?: SdkClientOptions;
}

/**
 * Resolved handler configuration.
 */
export interface HandlerConfig {
  readonly logGroup: string;
  readonly logStream?: string;
  readonly capacity: number;
  readonly retainDays?: RetentionDays;
  readonly level: LogLevel;
  readonly rejectPolicy: RejectPolicy;
  readonly truncationSuffix: string;
  readonly formatter: Formatter;
  readonly logger: Logger;
  readonly clock: () => Date;
  readonly aws: SdkClientOptions;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: {
  level: LogLevel;
  rejectPolicy: RejectPolicy;
  truncationSuffix: string;
} = {
  level: 'trace',
  rejectPolicy: 'retain',
  truncationSuffix: DEFAULT_TRUNCATION_SUFFIX,
};

const LOG_GROUP_NAME_PATTERN = /^[A-Za-z0-9._/#-]+$/;
const LOG_STREAM_NAME_PATTERN = /^[^:*]+$/;

const logGroupNameSchema = z
  .string()
  .min(1, 'Log group name cannot be empty')
  .max(512, 'Log group name too long (max 512 characters)')
  .regex(
    LOG_GROUP_NAME_PATTERN,
    'Must contain only alphanumerics, hyphens, underscores, forward slashes, periods and number signs'
  );

const logStreamNameSchema = z
  .string()
  .min(1, 'Log stream name cannot be empty')
  .max(512, 'Log stream name too long (max 512 characters)')
  .regex(LOG_STREAM_NAME_PATTERN, 'Log stream name cannot contain colons or asterisks');

const credentialsSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('static'),
    accessKeyId: z.string().min(1),
    secretAccessKey: z.string().min(1),
    sessionToken: z.string().optional(),
  }),
  z.object({ type: z.literal('profile'), profileName: z.string().min(1) }),
  z.object({ type: z.literal('environment') }),
]);

/**
 * Zod schema for the serializable part of the options.
 */
const optionsSchema = z.object({
  logGroup: logGroupNameSchema,
  logStream: logStreamNameSchema.optional(),
  retainDays: z
    .custom<RetentionDays>((value) => typeof value === 'number' && isRetentionDays(value), {
      message: `Must be one of: ${VALID_RETENTION_DAYS.join(', ')}`,
    })
    .optional(),
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).optional(),
  rejectPolicy: z.enum(['retain', 'drop']).optional(),
  truncationSuffix: z.string().max(256).optional(),
  aws: z
    .object({
      region: z.string().min(1).optional(),
      endpoint: z.string().url().optional(),
      credentials: credentialsSchema.optional(),
    })
    .optional(),
});

/**
 * Validate handler options and apply defaults.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function resolveHandlerConfig(options: HandlerOptions): HandlerConfig {
  const capacity = validateCapacity(options.capacity);

  const result = optionsSchema.safeParse({
    logGroup: options.logGroup,
    logStream: options.logStream,
    retainDays: options.retainDays,
    level: options.level,
    rejectPolicy: options.rejectPolicy,
    truncationSuffix: options.truncationSuffix,
    aws: options.aws,
  });
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`);
  }
  const parsed = result.data;

  return {
    logGroup: parsed.logGroup,
    logStream: parsed.logStream,
    capacity,
    retainDays: parsed.retainDays,
    level: parsed.level ?? DEFAULT_CONFIG.level,
    rejectPolicy: parsed.rejectPolicy ?? DEFAULT_CONFIG.rejectPolicy,
    truncationSuffix: parsed.truncationSuffix ?? DEFAULT_CONFIG.truncationSuffix,
    formatter: options.formatter ?? new PatternFormatter(),
    logger: options.logger ?? new NoopLogger(),
    clock: options.clock ?? (() => new Date()),
    aws: parsed.aws ?? {},
  };
}

/**
 * Validate a log group name.
 *
 * @throws {ConfigurationError} If the name is empty, too long or contains invalid characters
 */
export function validateLogGroupName(name: string): void {
  const result = logGroupNameSchema.safeParse(name);
  if (!result.success) {
    throw new ConfigurationError(`Invalid log group name "${name}": ${result.error.issues[0].message}`);
  }
}

/**
 * Validate a log stream name.
 *
 * @throws {ConfigurationError} If the name is empty, too long or contains ':' or '*'
 */
export function validateLogStreamName(name: string): void {
  const result = logStreamNameSchema.safeParse(name);
  if (!result.success) {
    throw new ConfigurationError(`Invalid log stream name "${name}": ${result.error.issues[0].message}`);
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isRejectPolicy(value: string): value is RejectPolicy {
  return value === 'retain' || value === 'drop';
}

function parseInteger(variable: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`${variable} must be an integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

function parseDiagnosticLevel(value: string): DiagnosticLevel {
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') {
    return 'debug';
  }
  if (isLogLevel(normalized) && normalized !== 'fatal') {
    return normalized;
  }
  throw new ConfigurationError(`CLOUDWATCH_LOGS_HANDLER_DEBUG must be a log level or "true", got "${value}"`);
}

/**
 * Handler configuration builder.
 *
 * Provides a fluent API for constructing handler configuration.
 * All methods return `this` for chaining.
 *
 * @example
 * ```typescript
 * const config = new HandlerConfigBuilder()
 *   .fromEnv()
 *   .logGroup('my-service')
 *   .capacity(500)
 *   .retainDays(14)
 *   .build();
 * ```
 */
export class HandlerConfigBuilder {
  private config: Partial<HandlerOptions> = {};

  /**
   * Set the log group name.
   */
  logGroup(name: string): this {
    validateLogGroupName(name);
    this.config.logGroup = name;
    return this;
  }

  /**
   * Set a fixed log stream name.
   */
  logStream(name: string): this {
    validateLogStreamName(name);
    this.config.logStream = name;
    return this;
  }

  /**
   * Set the buffer capacity in events.
   */
  capacity(n: number): this {
    this.config.capacity = n;
    return this;
  }

  /**
   * Set the retention applied to a newly created log group.
   */
  retainDays(days: number): this {
    this.config.retainDays = days;
    return this;
  }

  /**
   * Set the minimum level of records the handler accepts.
   */
  level(level: LogLevel): this {
    this.config.level = level;
    return this;
  }

  /**
   * Set what happens to a batch when events are rejected.
   */
  rejectPolicy(policy: RejectPolicy): this {
    this.config.rejectPolicy = policy;
    return this;
  }

  /**
   * Set the suffix appended to truncated messages.
   */
  truncationSuffix(suffix: string): this {
    this.config.truncationSuffix = suffix;
    return this;
  }

  /**
   * Set the record formatter.
   */
  formatter(formatter: Formatter): this {
    this.config.formatter = formatter;
    return this;
  }

  /**
   * Set the diagnostic logger.
   */
  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  /**
   * Set the clock used for daily stream names.
   */
  clock(clock: () => Date): this {
    this.config.clock = clock;
    return this;
  }

  /**
   * Set the AWS region.
   */
  region(region: string): this {
    this.config.aws = { ...this.config.aws, region };
    return this;
  }

  /**
   * Set a custom endpoint URL.
   *
   * @example
   * builder.endpoint('http://localhost:4566')  // LocalStack
   */
  endpoint(endpoint: string): this {
    this.config.aws = { ...this.config.aws, endpoint };
    return this;
  }

  /**
   * Set the credential source.
   */
  credentials(credentials: SdkCredentials): this {
    this.config.aws = { ...this.config.aws, credentials };
    return this;
  }

  /**
   * Load configuration from environment variables.
   *
   * Reads the following environment variables:
   * - CLOUDWATCH_LOGS_GROUP: Log group
   * - CLOUDWATCH_LOGS_STREAM: Fixed log stream
   * - CLOUDWATCH_LOGS_CAPACITY: Buffer capacity
   * - CLOUDWATCH_LOGS_RETAIN_DAYS: Retention for a new group
   * - CLOUDWATCH_LOGS_LEVEL: Minimum record level
   * - CLOUDWATCH_LOGS_REJECT_POLICY: "retain" or "drop"
   * - CLOUDWATCH_LOGS_HANDLER_DEBUG: Diagnostic level ("true" means debug)
   * - AWS_REGION or AWS_DEFAULT_REGION: Region
   * - AWS_ENDPOINT_URL_LOGS or AWS_ENDPOINT_URL: Custom endpoint
   * - AWS_PROFILE: Shared credentials profile
   *
   * @param env - Environment to read, `process.env` by default
   * @returns This builder for chaining
   * @throws {ConfigurationError} If a variable holds an unparseable value
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const group = env.CLOUDWATCH_LOGS_GROUP;
    if (group) {
      this.logGroup(group);
    }

    const stream = env.CLOUDWATCH_LOGS_STREAM;
    if (stream) {
      this.logStream(stream);
    }

    const capacity = env.CLOUDWATCH_LOGS_CAPACITY;
    if (capacity) {
      this.config.capacity = parseInteger('CLOUDWATCH_LOGS_CAPACITY', capacity);
    }

    const retainDays = env.CLOUDWATCH_LOGS_RETAIN_DAYS;
    if (retainDays) {
      this.config.retainDays = parseInteger('CLOUDWATCH_LOGS_RETAIN_DAYS', retainDays);
    }

    const level = env.CLOUDWATCH_LOGS_LEVEL?.toLowerCase();
    if (level) {
      if (!isLogLevel(level)) {
        throw new ConfigurationError(`CLOUDWATCH_LOGS_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
      }
      this.config.level = level;
    }

    const policy = env.CLOUDWATCH_LOGS_REJECT_POLICY?.toLowerCase();
    if (policy) {
      if (!isRejectPolicy(policy)) {
        throw new ConfigurationError('CLOUDWATCH_LOGS_REJECT_POLICY must be "retain" or "drop"');
      }
      this.config.rejectPolicy = policy;
    }

    const debug = env.CLOUDWATCH_LOGS_HANDLER_DEBUG;
    if (debug) {
      this.config.logger = new ConsoleLogger(parseDiagnosticLevel(debug));
    }

    // AWS
    const region = env.AWS_REGION ?? env.AWS_DEFAULT_REGION;
    if (region) {
      this.region(region);
    }

    const endpoint = env.AWS_ENDPOINT_URL_LOGS ?? env.AWS_ENDPOINT_URL;
    if (endpoint) {
      this.endpoint(endpoint);
    }

    const profile = env.AWS_PROFILE;
    if (profile) {
      this.credentials({ type: 'profile', profileName: profile });
    }

    return this;
  }

  /**
   * Build the configuration.
   *
   * @returns Complete handler configuration
   * @throws {ConfigurationError} If required fields are missing or invalid
   */
  build(): HandlerConfig {
    const { logGroup } = this.config;
    if (!logGroup) {
      throw new ConfigurationError('Log group must be specified');
    }
    return resolveHandlerConfig({ ...this.config, logGroup });
  }
}

/**
 * Create a new handler config builder.
 */
export function configBuilder(): HandlerConfigBuilder {
  return new HandlerConfigBuilder();
}
