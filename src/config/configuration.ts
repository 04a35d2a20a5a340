import { ConfigType, registerAs } from '@nestjs/config';
import { ConfigurationError } from '../common/errors';
import { formatPair, splitPair } from '../common/helper';
import { RetryPolicy } from '../common/retry';
import { validateEnvironment } from './env.validation';

export interface TradingConfig {
  /** Unified ccxt symbol, e.g. BTC/USDT */
  symbol: string;
  baseCurrency: string;
  quoteCurrency: string;
  /** Minimum net profit, in percent, strictly exceeded before trading */
  profitThresholdPercent: number;
  /** Units of the base currency per leg */
  tradeAmount: number;
  /** Taker fee applied to each leg */
  feeRate: number;
  pollingIntervalMs: number;
}

export interface AppConfig {
  port: number;
  environment: string;
  logLevel: string;

  trading: TradingConfig;
  retry: RetryPolicy;
  ledger: {
    maxRecords: number;
  };

  exchanges: {
    okx: {
      apiKey: string;
      secret: string;
      password: string;
    };
    kraken: {
      apiKey: string;
      secret: string;
    };
  };

  notifications: {
    telegram?: {
      botToken: string;
      chatId: string;
      commandsEnabled: boolean;
    };
  };
}

/**
 * Map (and validate) environment variables onto the application config.
 * Throws ConfigurationError on anything the bot cannot run with.
 */
export function loadAppConfig(raw: Record<string, string | undefined>): AppConfig {
  const env = validateEnvironment(raw);
  const problems: string[] = [];

  const symbol = formatPair(env.SYMBOL);
  const pair = splitPair(symbol);
  if (!pair) {
    problems.push(`SYMBOL must look like BASE/QUOTE, got "${env.SYMBOL}"`);
  }

  const okx = [env.OKX_API_KEY, env.OKX_SECRET_KEY, env.OKX_PASSPHRASE];
  if (okx.some(Boolean) && !okx.every(Boolean)) {
    problems.push('OKX_API_KEY, OKX_SECRET_KEY and OKX_PASSPHRASE must be set together');
  }

  const kraken = [env.KRAKEN_API_KEY, env.KRAKEN_SECRET_KEY];
  if (kraken.some(Boolean) && !kraken.every(Boolean)) {
    problems.push('KRAKEN_API_KEY and KRAKEN_SECRET_KEY must be set together');
  }

  if (env.TELEGRAM_BOT_TOKEN && !env.TELEGRAM_CHAT_ID) {
    problems.push('TELEGRAM_CHAT_ID is required when TELEGRAM_BOT_TOKEN is set');
  }

  if (problems.length > 0 || !pair) {
    throw new ConfigurationError(problems);
  }

  return {
    port: env.PORT,
    environment: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    trading: {
      symbol,
      baseCurrency: pair.base,
      quoteCurrency: pair.quote,
      profitThresholdPercent: env.PROFIT_THRESHOLD_PERCENT,
      tradeAmount: env.TRADE_AMOUNT,
      feeRate: env.FEE_RATE,
      pollingIntervalMs: env.POLLING_INTERVAL_MS,
    },

    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      initialDelayMs: env.RETRY_INITIAL_DELAY_MS,
      backoffFactor: env.RETRY_BACKOFF_FACTOR,
    },

    ledger: {
      maxRecords: env.LEDGER_MAX_RECORDS,
    },

    exchanges: {
      okx: {
        apiKey: env.OKX_API_KEY ?? '',
        secret: env.OKX_SECRET_KEY ?? '',
        password: env.OKX_PASSPHRASE ?? '',
      },
      kraken: {
        apiKey: env.KRAKEN_API_KEY ?? '',
        secret: env.KRAKEN_SECRET_KEY ?? '',
      },
    },

    notifications: {
      telegram: env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID
        ? {
          botToken: env.TELEGRAM_BOT_TOKEN,
          chatId: env.TELEGRAM_CHAT_ID,
          commandsEnabled: env.TELEGRAM_COMMANDS_ENABLED === 'true',
        }
        : undefined,
    },
  };
}

export const appConfig = registerAs('app', () => loadAppConfig(process.env));

export type AppConfigType = ConfigType<typeof appConfig>;
