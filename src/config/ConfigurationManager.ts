/**
 * Configuration Manager for the mirror engine
 * Defaults, environment overrides and schema validation in one place; every
 * component receives its section by constructor injection
 */

import type { Decimal } from '../utils/decimals';
import { z } from 'zod';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import { addressField, fractionDecimal, nonNegativeDecimal, positiveDecimal } from '../utils/schemas';

export const SizingConfigSchema = z.object({
  copyRatio: positiveDecimal(),
  maxOrderSize: positiveDecimal().optional(),
  minOrderSize: positiveDecimal().optional(),
  sizeTick: positiveDecimal().optional(),
  priceTick: positiveDecimal().optional(),
  respectBalance: z.boolean(),
  enforceMinimum: z.boolean()
});

export const RiskConfigSchema = z.object({
  minBalance: nonNegativeDecimal().optional(),
  minOrderSize: nonNegativeDecimal(),
  maxPositionSize: positiveDecimal(),
  maxTotalExposure: positiveDecimal(),
  maxMarketConcentration: fractionDecimal().optional(),
  marginRatio: fractionDecimal()
});

export const RetryConfigSchema = z.object({
  baseDelayMs: z.number().int().positive(),
  backoffMultiplier: z.number().min(1),
  maxDelayMs: z.number().int().positive(),
  maxAttempts: z.number().int().min(0),
  processIntervalMs: z.number().int().positive()
});

export const CircuitBreakerConfigSchema = z.object({
  failureThreshold: z.number().int().positive(),
  windowMs: z.number().int().positive(),
  cooldownMs: z.number().int().positive()
});

export const TrackingConfigSchema = z.object({
  recentFillCapacity: z.number().int().positive(),
  terminalOrderTtlMs: z.number().int().positive(),
  cleanupIntervalMs: z.number().int().positive()
});

export const MirrorConfigSchema = z
  .object({
    environment: z.enum(['development', 'staging', 'production']),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    wallets: z.object({
      sources: z.array(addressField()).min(1, 'At least one source wallet is required'),
      mirror: addressField()
    }),
    markets: z.array(addressField()).min(1, 'At least one market is required'),
    collateralAsset: z.string().trim().min(1),
    sizing: SizingConfigSchema,
    risk: RiskConfigSchema,
    retry: RetryConfigSchema,
    circuitBreaker: CircuitBreakerConfigSchema,
    tracking: TrackingConfigSchema
  })
  .superRefine((config, ctx) => {
    if (config.wallets.sources.includes(config.wallets.mirror)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['wallets', 'mirror'],
        message: 'Mirror wallet must not also be a source wallet'
      });
    }
    if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'maxDelayMs'],
        message: 'Max delay must be at least the base delay'
      });
    }
    const { minOrderSize, maxOrderSize } = config.sizing;
    if (minOrderSize && maxOrderSize && minOrderSize.gt(maxOrderSize)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sizing', 'minOrderSize'],
        message: 'Minimum order size must not exceed maximum order size'
      });
    }
  });

export type MirrorConfig = z.output<typeof MirrorConfigSchema>;
export type MirrorConfigInput = z.input<typeof MirrorConfigSchema>;
export type SizingConfig = MirrorConfig['sizing'];
export type RiskConfig = MirrorConfig['risk'];
export type RetryConfig = MirrorConfig['retry'];

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends Decimal
      ? T[K]
      : T[K] extends object
        ? DeepPartial<T[K]>
        : T[K];
};

export type MirrorConfigOverrides = DeepPartial<MirrorConfigInput>;

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export interface EnvironmentVariables {
  NODE_ENV?: string;
  LOG_LEVEL?: string;
  MIRROR_SOURCE_WALLETS?: string;
  MIRROR_WALLET?: string;
  MIRROR_MARKETS?: string;
  MIRROR_COLLATERAL_ASSET?: string;
  MIRROR_COPY_RATIO?: string;
  MIRROR_MAX_ORDER_SIZE?: string;
  MIRROR_MIN_ORDER_SIZE?: string;
  MIRROR_MAX_POSITION_SIZE?: string;
  MIRROR_MAX_TOTAL_EXPOSURE?: string;
  MIRROR_MAX_MARKET_CONCENTRATION?: string;
  MIRROR_MIN_BALANCE?: string;
  MIRROR_RETRY_MAX_ATTEMPTS?: string;
  MIRROR_RETRY_BASE_DELAY_MS?: string;
  MIRROR_BREAKER_THRESHOLD?: string;
  MIRROR_BREAKER_WINDOW_MS?: string;
  MIRROR_BREAKER_COOLDOWN_MS?: string;
  [key: string]: string | undefined;
}

const ENVIRONMENTS = ['development', 'staging', 'production'] as const;
const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(candidate => candidate === value);
}

function splitList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

export class ConfigurationManager {
  private config?: MirrorConfig;

  constructor(private readonly env: EnvironmentVariables = process.env) {}

  /**
   * Builds the configuration from defaults, environment variables and explicit
   * overrides (highest precedence), then validates it
   */
  loadConfiguration(overrides: MirrorConfigOverrides = {}): MirrorConfig {
    const merged = this.mergeConfigurations(
      this.mergeConfigurations(this.getDefaultConfiguration(), this.loadConfigurationFromEnvironment()),
      overrides
    );

    const parsed = MirrorConfigSchema.safeParse(merged);
    if (!parsed.success) {
      const errors = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ApplicationError(
        `Configuration validation failed: ${errors.join(', ')}`,
        'INVALID_CONFIGURATION',
        ErrorCategory.CONFIGURATION,
        ErrorSeverity.CRITICAL,
        {
          operation: 'loadConfiguration',
          component: 'ConfigurationManager',
          timestamp: new Date()
        }
      );
    }

    this.config = parsed.data;
    return parsed.data;
  }

  /**
   * Gets the current configuration
   */
  getConfiguration(): MirrorConfig {
    if (!this.config) {
      throw new Error('Configuration has not been loaded');
    }
    return { ...this.config };
  }

  /**
   * Gets a specific configuration section
   */
  getConfigSection<T extends keyof MirrorConfig>(section: T): MirrorConfig[T] {
    return this.getConfiguration()[section];
  }

  /**
   * Updates a specific configuration section; the result must validate
   */
  updateConfigSection<T extends 'sizing' | 'risk' | 'retry' | 'circuitBreaker' | 'tracking'>(
    section: T,
    updates: Partial<MirrorConfigInput[T]>
  ): MirrorConfig {
    const current = this.getConfiguration();
    const candidate = { ...current, [section]: { ...current[section], ...updates } };

    const parsed = MirrorConfigSchema.safeParse(candidate);
    if (!parsed.success) {
      const errors = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ApplicationError(
        `Invalid ${section} update: ${errors.join(', ')}`,
        'INVALID_CONFIGURATION',
        ErrorCategory.CONFIGURATION,
        ErrorSeverity.HIGH,
        {
          operation: 'updateConfigSection',
          component: 'ConfigurationManager',
          timestamp: new Date(),
          metadata: { section }
        }
      );
    }

    this.config = parsed.data;
    return parsed.data;
  }

  /**
   * Validates a candidate configuration without applying it
   */
  validateConfiguration(candidate: unknown): ConfigValidationResult {
    const parsed = MirrorConfigSchema.safeParse(candidate);
    if (parsed.success) {
      return { isValid: true, errors: [] };
    }

    return {
      isValid: false,
      errors: parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    };
  }

  /**
   * Gets environment-specific configuration overrides
   */
  private loadConfigurationFromEnvironment(): MirrorConfigOverrides {
    const env = this.env;
    const envConfig: MirrorConfigOverrides = {};

    if (env.NODE_ENV && isOneOf(ENVIRONMENTS, env.NODE_ENV)) {
      envConfig.environment = env.NODE_ENV;
    }

    if (env.LOG_LEVEL && isOneOf(LOG_LEVELS, env.LOG_LEVEL)) {
      envConfig.logLevel = env.LOG_LEVEL;
    }

    if (env.MIRROR_SOURCE_WALLETS || env.MIRROR_WALLET) {
      envConfig.wallets = {
        ...(env.MIRROR_SOURCE_WALLETS && { sources: splitList(env.MIRROR_SOURCE_WALLETS) }),
        ...(env.MIRROR_WALLET && { mirror: env.MIRROR_WALLET })
      };
    }

    if (env.MIRROR_MARKETS) {
      envConfig.markets = splitList(env.MIRROR_MARKETS);
    }

    if (env.MIRROR_COLLATERAL_ASSET) {
      envConfig.collateralAsset = env.MIRROR_COLLATERAL_ASSET;
    }

    if (env.MIRROR_COPY_RATIO || env.MIRROR_MAX_ORDER_SIZE || env.MIRROR_MIN_ORDER_SIZE) {
      envConfig.sizing = {
        ...(env.MIRROR_COPY_RATIO && { copyRatio: env.MIRROR_COPY_RATIO }),
        ...(env.MIRROR_MAX_ORDER_SIZE && { maxOrderSize: env.MIRROR_MAX_ORDER_SIZE }),
        ...(env.MIRROR_MIN_ORDER_SIZE && { minOrderSize: env.MIRROR_MIN_ORDER_SIZE })
      };
    }

    if (
      env.MIRROR_MIN_ORDER_SIZE ||
      env.MIRROR_MAX_POSITION_SIZE ||
      env.MIRROR_MAX_TOTAL_EXPOSURE ||
      env.MIRROR_MAX_MARKET_CONCENTRATION ||
      env.MIRROR_MIN_BALANCE
    ) {
      envConfig.risk = {
        ...(env.MIRROR_MIN_ORDER_SIZE && { minOrderSize: env.MIRROR_MIN_ORDER_SIZE }),
        ...(env.MIRROR_MAX_POSITION_SIZE && { maxPositionSize: env.MIRROR_MAX_POSITION_SIZE }),
        ...(env.MIRROR_MAX_TOTAL_EXPOSURE && { maxTotalExposure: env.MIRROR_MAX_TOTAL_EXPOSURE }),
        ...(env.MIRROR_MAX_MARKET_CONCENTRATION && { maxMarketConcentration: env.MIRROR_MAX_MARKET_CONCENTRATION }),
        ...(env.MIRROR_MIN_BALANCE && { minBalance: env.MIRROR_MIN_BALANCE })
      };
    }

    if (env.MIRROR_RETRY_MAX_ATTEMPTS || env.MIRROR_RETRY_BASE_DELAY_MS) {
      envConfig.retry = {
        ...(env.MIRROR_RETRY_MAX_ATTEMPTS && { maxAttempts: parseInteger(env.MIRROR_RETRY_MAX_ATTEMPTS) }),
        ...(env.MIRROR_RETRY_BASE_DELAY_MS && { baseDelayMs: parseInteger(env.MIRROR_RETRY_BASE_DELAY_MS) })
      };
    }

    if (env.MIRROR_BREAKER_THRESHOLD || env.MIRROR_BREAKER_WINDOW_MS || env.MIRROR_BREAKER_COOLDOWN_MS) {
      envConfig.circuitBreaker = {
        ...(env.MIRROR_BREAKER_THRESHOLD && { failureThreshold: parseInteger(env.MIRROR_BREAKER_THRESHOLD) }),
        ...(env.MIRROR_BREAKER_WINDOW_MS && { windowMs: parseInteger(env.MIRROR_BREAKER_WINDOW_MS) }),
        ...(env.MIRROR_BREAKER_COOLDOWN_MS && { cooldownMs: parseInteger(env.MIRROR_BREAKER_COOLDOWN_MS) })
      };
    }

    return envConfig;
  }

  /**
   * Merges two configuration objects, section by section, with precedence to override
   */
  private mergeConfigurations(base: MirrorConfigOverrides, override: MirrorConfigOverrides): MirrorConfigOverrides {
    return {
      ...base,
      ...override,
      wallets: { ...base.wallets, ...override.wallets },
      sizing: { ...base.sizing, ...override.sizing },
      risk: { ...base.risk, ...override.risk },
      retry: { ...base.retry, ...override.retry },
      circuitBreaker: { ...base.circuitBreaker, ...override.circuitBreaker },
      tracking: { ...base.tracking, ...override.tracking }
    };
  }

  /**
   * Gets default configuration. Wallets and markets have no defaults and must
   * come from the environment or overrides.
   */
  private getDefaultConfiguration(): MirrorConfigOverrides {
    return {
      environment: 'development',
      logLevel: 'info',
      wallets: {
        sources: []
      },
      markets: [],
      collateralAsset: 'USDC',
      sizing: {
        copyRatio: '1',
        respectBalance: false,
        enforceMinimum: false
      },
      risk: {
        minOrderSize: '0',
        maxPositionSize: '1000',
        maxTotalExposure: '5000',
        marginRatio: '1'
      },
      retry: {
        baseDelayMs: 1000,
        backoffMultiplier: 2,
        maxDelayMs: 30000,
        maxAttempts: 3,
        processIntervalMs: 500
      },
      circuitBreaker: {
        failureThreshold: 10,
        windowMs: 60000, // 1 minute
        cooldownMs: 300000 // 5 minutes
      },
      tracking: {
        recentFillCapacity: 10000,
        terminalOrderTtlMs: 3600000, // 1 hour
        cleanupIntervalMs: 60000
      }
    };
  }
}
