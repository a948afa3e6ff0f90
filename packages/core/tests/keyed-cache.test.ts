import { expect, use } from 'chai'
import chaiAsPromised from 'chai-as-promised'
import { KeyedCache, SingleFlight } from '../src/cache/index.js'
import { deferred } from './helpers.js'
use(chaiAsPromised)

describe('KeyedCache', () => {
    let now = 0
    const clock = () => now

    beforeEach(() => {
        now = 1_000_000
    })

    function counter() {
        let loads = 0
        return {
            load: async () => `v${++loads}`,
            get loads() {
                return loads
            },
        }
    }

    it('serves a fresh entry without calling the loader', async () => {
        const cache = new KeyedCache<string>({ ttlMs: 100, now: clock })
        const source = counter()

        const first = await cache.get('k', source.load)
        now += 99
        const second = await cache.get('k', source.load)

        expect(first).to.deep.equal({ value: 'v1', degraded: false, storedAt: 1_000_000, hit: false })
        expect(second).to.deep.equal({ value: 'v1', degraded: false, storedAt: 1_000_000, hit: true })
        expect(source.loads).to.equal(1)
    })

    it('reloads once the ttl has passed', async () => {
        const cache = new KeyedCache<string>({ ttlMs: 100, now: clock })
        const source = counter()

        await cache.get('k', source.load)
        now += 100
        const second = await cache.get('k', source.load)

        expect(second).to.deep.equal({ value: 'v2', degraded: false, storedAt: 1_000_100, hit: false })
        expect(source.loads).to.equal(2)
    })

    it('collapses concurrent misses onto one load', async () => {
        const cache = new KeyedCache<string>({ ttlMs: 100, now: clock })
        const gate = deferred<string>()
        let loads = 0
        const load = () => {
            loads++
            return gate.promise
        }

        const a = cache.get('k', load)
        const b = cache.get('k', load)
        expect(cache.loading).to.equal(1)

        gate.resolve('shared')
        const [ra, rb] = await Promise.all([a, b])

        expect(ra.value).to.equal('shared')
        expect(rb.value).to.equal('shared')
        expect(loads).to.equal(1)
        expect(cache.loading).to.equal(0)
    })

    it('keeps different keys apart', async () => {
        const cache = new KeyedCache<string>({ ttlMs: 100, now: clock })
        const source = counter()

        const a = await cache.get('a', source.load)
        const b = await cache.get('b', source.load)

        expect(a.value).to.equal('v1')
        expect(b.value).to.equal('v2')
        expect(cache.size).to.equal(2)
    })

    it('serves the stale value marked degraded when a refresh fails inside the grace window', async () => {
        const cache = new KeyedCache<string>({ ttlMs: 100, graceMs: 50, now: clock })
        await cache.get('k', async () => 'old')

        now += 149
        const result = await cache.get('k', async () => {
            throw new Error('boom')
        })

        expect(result).to.deep.equal({ value: 'old', degraded: true, storedAt: 1_000_000, hit: true })
    })

    it('propagates the failure once past the grace window', async () => {
        const cache = new KeyedCache<string>({ ttlMs: 100, graceMs: 50, now: clock })
        await cache.get('k', async () => 'old')

        now += 150
        await expect(cache.get('k', async () => {
            throw new Error('boom')
        })).to.be.rejectedWith('boom')
    })

    it('never caches a failed load', async () => {
        const cache = new KeyedCache<string>({ ttlMs: 100, now: clock })

        await expect(cache.get('k', async () => {
            throw new Error('first')
        })).to.be.rejectedWith('first')
        const result = await cache.get('k', async () => 'second')

        expect(result.value).to.equal('second')
        expect(result.hit).to.equal(false)
    })

    it('drops the oldest entries beyond maxEntries', async () => {
        const cache = new KeyedCache<string>({ ttlMs: 1000, maxEntries: 2, now: clock })
        await cache.get('a', async () => 'A')
        await cache.get('b', async () => 'B')
        await cache.get('c', async () => 'C')

        expect(cache.size).to.equal(2)
        expect(cache.peek('a')).to.equal(undefined)
        expect(cache.peek('c')).to.deep.equal({ value: 'C', storedAt: 1_000_000, fresh: true })
    })

    it('invalidate forces the next get to load', async () => {
        const cache = new KeyedCache<string>({ ttlMs: 1000, now: clock })
        const source = counter()

        await cache.get('k', source.load)
        expect(cache.invalidate('k')).to.equal(true)
        const result = await cache.get('k', source.load)

        expect(result.value).to.equal('v2')
    })
})

describe('SingleFlight', () => {
    it('releases the key once the call settles', async () => {
        const flights = new SingleFlight<number>()
        const gate = deferred<number>()

        const running = flights.run('k', () => gate.promise)
        expect(flights.has('k')).to.equal(true)

        gate.resolve(7)
        expect(await running).to.equal(7)
        expect(flights.has('k')).to.equal(false)
    })

    it('releases the key after a rejection too', async () => {
        const flights = new SingleFlight<number>()

        await expect(flights.run('k', async () => {
            throw new Error('nope')
        })).to.be.rejectedWith('nope')

        expect(flights.size).to.equal(0)
    })
})
