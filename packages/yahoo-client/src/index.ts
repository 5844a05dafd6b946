/**
 * Yahoo Finance market data provider
 */

export {
  YahooRestClient,
  YAHOO_TICKERS,
  YAHOO_INTERVALS,
  YAHOO_HISTORY_RANGES,
  type YahooClientOptions,
} from './rest/client';
export { YahooChartResponseSchema, type YahooChartResponse } from './rest/chart.schema';
