import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors';

const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  NODE_ENV: string = 'development';

  @IsIn(LOG_LEVELS)
  LOG_LEVEL: string = 'log';

  @IsString()
  SYMBOL: string = 'BTC/USDT';

  @IsNumber()
  @Min(0)
  PROFIT_THRESHOLD_PERCENT: number = 0.5;

  @IsNumber()
  @Min(0.00000001)
  TRADE_AMOUNT: number = 0.001;

  @IsNumber()
  @Min(0)
  @Max(0.999999)
  FEE_RATE: number = 0.001;

  @IsInt()
  @Min(1)
  POLLING_INTERVAL_MS: number = 2000;

  @IsInt()
  @Min(1)
  @Max(20)
  RETRY_MAX_ATTEMPTS: number = 3;

  @IsInt()
  @Min(0)
  RETRY_INITIAL_DELAY_MS: number = 1000;

  @IsNumber()
  @Min(1)
  RETRY_BACKOFF_FACTOR: number = 2;

  @IsInt()
  @Min(1)
  LEDGER_MAX_RECORDS: number = 1000;

  @IsOptional()
  @IsString()
  OKX_API_KEY?: string;

  @IsOptional()
  @IsString()
  OKX_SECRET_KEY?: string;

  @IsOptional()
  @IsString()
  OKX_PASSPHRASE?: string;

  @IsOptional()
  @IsString()
  KRAKEN_API_KEY?: string;

  @IsOptional()
  @IsString()
  KRAKEN_SECRET_KEY?: string;

  @IsOptional()
  @IsString()
  TELEGRAM_BOT_TOKEN?: string;

  @IsOptional()
  @IsString()
  TELEGRAM_CHAT_ID?: string;

  @IsBooleanString()
  TELEGRAM_COMMANDS_ENABLED: string = 'true';
}

/**
 * Validate raw environment values. Empty strings count as unset so that a
 * blank line in `.env` falls back to the default.
 */
export function validateEnvironment(
  raw: Record<string, string | undefined>,
): EnvironmentVariables {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const env = plainToInstance(EnvironmentVariables, present, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(env, { skipMissingProperties: false });

  const problems = errors.flatMap((error) =>
    Object.values(error.constraints ?? {}),
  );
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return env;
}
