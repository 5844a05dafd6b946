import type { IMarketDataProvider, MarketSymbol, RawCandle, Timeframe } from '@candle-sync/schemas';
import { createLogger } from '@candle-sync/utils';
import { YahooChartResponseSchema, type YahooChartResponse } from './chart.schema';

const logger = createLogger('provider:yahoo');

/**
 * Yahoo ticker for each tracked symbol
 */
export const YAHOO_TICKERS: Record<MarketSymbol, string> = {
  es: 'ES=F',
  eurusd: 'EURUSD=X',
  spy: 'SPY',
};

/**
 * Yahoo interval names; Yahoo calls '1h' '60m' and has no 4h bars
 */
export const YAHOO_INTERVALS: Partial<Record<Timeframe, string>> = {
  '1m': '1m',
  '5m': '5m',
  '15m': '15m',
  '30m': '30m',
  '1h': '60m',
  '1d': '1d',
};

/**
 * Longest range Yahoo serves for each interval. Intraday history is capped
 * server side, so asking for 'max' on 1m returns an error.
 */
export const YAHOO_HISTORY_RANGES: Partial<Record<Timeframe, string>> = {
  '1m': '7d',
  '5m': '60d',
  '15m': '60d',
  '30m': '60d',
  '1h': '730d',
  '1d': 'max',
};

export interface YahooClientOptions {
  baseUrl?: string;
  /** Abort a request after this many ms */
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

/**
 * Yahoo Finance chart API client
 *
 * Fetches OHLCV bars for the tracked symbols. Returned candles are raw:
 * timestamps are UTC epoch ms as Yahoo reports them, volume may be missing.
 */
export class YahooRestClient implements IMarketDataProvider {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchFn: typeof fetch;

  constructor(options: YahooClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://query1.finance.yahoo.com';
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /**
   * Newest bar from a short recent window (1 month for daily, 5 days otherwise)
   */
  async getLatestCandle(symbol: MarketSymbol, timeframe: Timeframe): Promise<RawCandle | null> {
    const range = timeframe === '1d' ? '1mo' : '5d';
    const candles = await this.getCandles(symbol, timeframe, range);
    return candles.length > 0 ? candles[candles.length - 1] : null;
  }

  /**
   * Full history Yahoo will serve for the interval
   */
  async getHistory(symbol: MarketSymbol, timeframe: Timeframe): Promise<RawCandle[]> {
    return this.getCandles(symbol, timeframe, YAHOO_HISTORY_RANGES[timeframe] ?? 'max');
  }

  /**
   * Fetch bars for a symbol over a Yahoo range string (e.g. '5d', 'max')
   */
  async getCandles(symbol: MarketSymbol, timeframe: Timeframe, range: string): Promise<RawCandle[]> {
    const ticker = YAHOO_TICKERS[symbol];
    const interval = YAHOO_INTERVALS[timeframe];
    if (!interval) {
      throw new Error(`Timeframe ${timeframe} is not available from Yahoo`);
    }

    const params = new URLSearchParams({
      interval,
      range,
      includePrePost: 'false',
    });

    const path = `/v8/finance/chart/${encodeURIComponent(ticker)}?${params.toString()}`;

    try {
      const response = await this.request(path);
      return this.toRawCandles(response);
    } catch (error) {
      logger.error(
        { error: error instanceof Error ? error.message : String(error), symbol, timeframe, ticker, operation: 'fetch_chart' },
        'Failed to fetch candles from Yahoo'
      );
      throw error;
    }
  }

  /**
   * Zip the parallel quote arrays into candles, dropping bars without prices
   */
  private toRawCandles(response: YahooChartResponse): RawCandle[] {
    const result = response.chart.result?.[0];
    if (!result || !result.timestamp) {
      return [];
    }

    const quote = result.indicators.quote[0];
    if (!quote) {
      return [];
    }

    const candles: RawCandle[] = [];
    result.timestamp.forEach((seconds, i) => {
      const open = quote.open?.[i];
      const high = quote.high?.[i];
      const low = quote.low?.[i];
      const close = quote.close?.[i];
      if (open == null || high == null || low == null || close == null) {
        return;
      }

      candles.push({
        timestamp: seconds * 1000,
        open,
        high,
        low,
        close,
        volume: quote.volume?.[i] ?? undefined,
      });
    });

    return candles;
  }

  private async request(path: string): Promise<YahooChartResponse> {
    const url = `${this.baseUrl}${path}`;

    logger.debug({ path }, 'Making Yahoo chart request');

    const response = await this.fetchFn(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.error(
        { status: response.status, statusText: response.statusText, error: errorText },
        'Yahoo chart request failed'
      );
      throw new Error(`Yahoo API error: ${response.status} ${response.statusText}`);
    }

    const parsed = YahooChartResponseSchema.parse(await response.json());
    if (parsed.chart.error) {
      throw new Error(`Yahoo API error: ${parsed.chart.error.code} ${parsed.chart.error.description}`);
    }
    return parsed;
  }
}
