export { MarketDataFetcher, seriesKey } from './fetcher.js';
export type { FetchedSeries, FetchedTrending, MarketDataFetcherOptions } from './fetcher.js';
export { CoinMarketCapProvider } from './provider.js';
export type { MarketDataProvider, SeriesQuery, CoinMarketCapOptions } from './provider.js';
