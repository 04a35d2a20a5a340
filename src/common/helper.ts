/**
 * Quote currencies ordered longest first so 'USDT' wins over 'USD'.
 */
const COMMON_QUOTE_CURRENCIES = [
  'FDUSD', 'USDT', 'USDC', 'BUSD', 'TUSD',
  'BTC', 'ETH', 'BNB', 'DAI', 'USD', 'EUR',
];

/**
 * Convert 'BTCUSDT' into 'BTC/USDT'. Pairs that already carry a slash are
 * returned upper-cased; unknown quotes are returned unchanged.
 */
export const formatPair = (pair: string): string => {
  const normalized = pair.trim().toUpperCase();
  if (!normalized || normalized.includes('/')) {
    return normalized;
  }

  for (const quote of COMMON_QUOTE_CURRENCIES) {
    if (normalized.endsWith(quote) && normalized.length > quote.length) {
      const base = normalized.substring(0, normalized.length - quote.length);
      return `${base}/${quote}`;
    }
  }

  return normalized;
};

/**
 * Split a unified 'BASE/QUOTE' symbol. Returns null when either side is missing.
 */
export const splitPair = (pair: string): { base: string; quote: string } | null => {
  const [base, quote, ...rest] = formatPair(pair).split('/');
  if (!base || !quote || rest.length > 0) {
    return null;
  }
  return { base, quote };
};

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const formatUsd = (value: number): string => value.toFixed(2);

export const formatSigned = (value: number): string =>
  `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
