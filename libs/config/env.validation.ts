import { plainToInstance, Transform, Type } from "class-transformer";
import {
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from "class-validator";
import {
  LOG_LEVELS,
  LogFormat,
  LogLevel,
  normalizeLogLevel,
} from "@logging/core/domain/log-level";
import { parseBoolean } from "./env.parsers";

export const JWT_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

const DEVELOPMENT_ENVIRONMENTS = new Set(["dev", "development", "test"]);

export function isDevelopmentEnvironment(environment: string): boolean {
  return DEVELOPMENT_ENVIRONMENTS.has(environment.toLowerCase());
}

const toBoolean = ({ value }: { value: unknown }): unknown =>
  parseBoolean(value) ?? value;

const toLogLevel = ({ value }: { value: unknown }): unknown =>
  typeof value === "string" ? (normalizeLogLevel(value) ?? value) : value;

const toLowerCase = ({ value }: { value: unknown }): unknown =>
  typeof value === "string" ? value.trim().toLowerCase() : value;

/**
 * Shape of the process environment this service reads.
 * Everything is optional except the JWT secret outside development.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  APP_NAME?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  APP_VERSION?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  ENVIRONMENT?: string;

  @IsOptional()
  @IsString()
  HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  DATABASE_URL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  DATABASE_POOL_SIZE?: number;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DATABASE_AUTO_MIGRATE?: boolean;

  @ValidateIf(
    (env: EnvironmentVariables) =>
      !isDevelopmentEnvironment(env.ENVIRONMENT ?? "production"),
  )
  @IsString()
  @IsNotEmpty()
  JWT_SECRET?: string;

  @IsOptional()
  @IsIn(JWT_ALGORITHMS)
  JWT_ALGORITHM?: JwtAlgorithm;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  ACCESS_TOKEN_EXPIRE_MINUTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(4)
  @Max(31)
  BCRYPT_ROUNDS?: number;

  @IsOptional()
  @Transform(toLogLevel)
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: LogLevel;

  @IsOptional()
  @Transform(toLowerCase)
  @IsEnum(LogFormat)
  LOG_FORMAT?: LogFormat;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  METRICS_ENABLED?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  METRICS_COLLECT_DEFAULTS?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  TRACING_ENABLED?: boolean;

  @IsOptional()
  @IsUrl({ require_tld: false })
  TRACE_COLLECTOR_ENDPOINT?: string;
}

/**
 * Validation hook for ConfigModule.forRoot. Throws with every violation
 * listed so a misconfigured deployment fails at startup.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(", "))
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return config;
}
