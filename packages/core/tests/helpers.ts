import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import type { CoinRecord } from '../src/catalog/snapshot.js'
import type { MarketDataProvider, SeriesQuery } from '../src/market/provider.js'
import type { Candle, TrendingCoin } from '../src/types.js'

export const DAY_MS = 24 * 60 * 60 * 1000

export const RECORDS: CoinRecord[] = [
    { id: 1, symbol: 'BTC', name: 'Bitcoin', slug: 'bitcoin', rank: 1 },
    { id: 1027, symbol: 'ETH', name: 'Ethereum', slug: 'ethereum', rank: 2 },
    { id: 1831, symbol: 'BCH', name: 'Bitcoin Cash', slug: 'bitcoin-cash', rank: 18 },
    { id: 9001, symbol: 'ETH', name: 'Ether Clone', slug: 'ether-clone', rank: 2400 },
    { id: 9002, symbol: 'WELL', name: 'WELL3', slug: 'well3', rank: null },
    { id: 9003, symbol: 'WELL', name: 'Moonwell', slug: 'moonwell-artemis', rank: 300 },
]

export const TRENDING: TrendingCoin[] = [
    { id: '1', symbol: 'BTC', name: 'Bitcoin', price: 43250.4, priceChange24h: 2.5, volumeChange24h: 120 },
    { id: '1027', symbol: 'ETH', name: 'Ethereum', price: 2300, priceChange24h: -1.25, volumeChange24h: -40 },
    { id: '74', symbol: 'DOGE', name: 'Dogecoin', price: 0.0812, priceChange24h: 0, volumeChange24h: 8 },
]

/** Rising daily candles: open 100+i, close 101+i, volume 1000*(i+1) */
export function makeCandles(count: number, start = Date.UTC(2024, 0, 1), step = DAY_MS): Candle[] {
    return Array.from({ length: count }, (_, i) => ({
        timestamp: start + i * step,
        open: 100 + i,
        high: 102 + i,
        low: 99 + i,
        close: 101 + i,
        volume: 1000 * (i + 1),
    }))
}

export function deferred<T>() {
    let resolve: (value: T) => void = () => undefined
    let reject: (error: unknown) => void = () => undefined
    const promise = new Promise<T>((res, rej) => {
        resolve = res
        reject = rej
    })
    return { promise, resolve, reject }
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
}

/** The error a synchronous call throws */
export function thrown(fn: () => unknown): unknown {
    try {
        fn()
    } catch (error) {
        return error
    }
    throw new Error('expected the call to throw')
}

export async function makeTmpDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'chartd-test-'))
}

export async function removeTmpDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true })
}

/**
 * In-process MarketDataProvider. Records every call; can be told to fail,
 * to delay, or to never answer.
 */
export class FakeProvider implements MarketDataProvider {
    seriesCalls: SeriesQuery[] = []
    trendingCalls: number[] = []
    coinMapCalls = 0

    candles: Candle[] = makeCandles(30)
    trending: TrendingCoin[] = TRENDING
    coinMap: CoinRecord[] = RECORDS

    failWith: Error | null = null
    delayMs = 0
    hang = false

    async fetchSeries(query: SeriesQuery): Promise<Candle[]> {
        this.seriesCalls.push(query)
        await this.respond()
        return this.candles.map(candle => ({ ...candle }))
    }

    async fetchTrending(limit: number): Promise<TrendingCoin[]> {
        this.trendingCalls.push(limit)
        await this.respond()
        return this.trending.slice(0, limit).map(coin => ({ ...coin }))
    }

    async fetchCoinMap(): Promise<CoinRecord[]> {
        this.coinMapCalls++
        await this.respond()
        return this.coinMap.map(record => ({ ...record }))
    }

    private async respond(): Promise<void> {
        if (this.hang) {
            await new Promise<never>(() => undefined)
        }
        if (this.delayMs > 0) {
            await sleep(this.delayMs)
        }
        if (this.failWith) {
            throw this.failWith
        }
    }
}
