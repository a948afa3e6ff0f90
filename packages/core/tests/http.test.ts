import { expect } from 'chai'
import type { Server } from 'http'
import { writeFile } from 'fs/promises'
import { createHttpApp, runHTTP, bearerToken } from '../src/mcp.js'
import { identityFromAuth, toCallToolResult } from '../src/index.js'
import { createComponents, type Components } from '../src/chartd/daemon.js'
import { Config } from '../src/chartd/config.js'
import { silentLogger } from '../src/chartd/logger.js'
import { FakeProvider, RECORDS, makeTmpDir, removeTmpDir } from './helpers.js'

const SECRET = 'test-secret'

describe('MCP transport', () => {
    describe('bearerToken', () => {
        it('extracts the token from an Authorization header', () => {
            expect(bearerToken('Bearer test-secret')).to.equal('test-secret')
            expect(bearerToken('bearer   test-secret  ')).to.equal('test-secret')
        })

        it('ignores anything else', () => {
            expect(bearerToken(undefined)).to.equal(undefined)
            expect(bearerToken('Basic dXNlcjpwYXNz')).to.equal(undefined)
            expect(bearerToken('Bearer')).to.equal(undefined)
            expect(bearerToken('Bearer two tokens')).to.equal(undefined)
        })
    })

    describe('identityFromAuth', () => {
        it('prefers the client id over the session id', () => {
            expect(identityFromAuth({ token: SECRET, clientId: 'agent-1', scopes: [] }, 'session-9'))
                .to.deep.equal({ credential: SECRET, callerId: 'agent-1' })
            expect(identityFromAuth({ token: SECRET, clientId: '', scopes: [] }, 'session-9'))
                .to.deep.equal({ credential: SECRET, callerId: 'session-9' })
            expect(identityFromAuth(undefined, undefined))
                .to.deep.equal({ credential: undefined, callerId: undefined })
        })
    })

    describe('toCallToolResult', () => {
        it('puts the caption and link in the text content', () => {
            const result = toCallToolResult({ status: 'ok', url: 'https://charts.example.test/charts/abc', caption: 'Bitcoin (BTC) daily price chart, last 30 days.' })

            expect(result).to.deep.equal({
                content: [{ type: 'text', text: 'Bitcoin (BTC) daily price chart, last 30 days.\n\nhttps://charts.example.test/charts/abc' }],
                structuredContent: { status: 'ok', url: 'https://charts.example.test/charts/abc', caption: 'Bitcoin (BTC) daily price chart, last 30 days.' },
            })
        })

        it('adds heatmap figures to both the text and the structured content', () => {
            const data = [{ symbol: 'BTC', name: 'Bitcoin', price: 43250.4, priceChange24h: 2.5, volumeChange24h: 120 }]
            const result = toCallToolResult({
                status: 'ok',
                url: 'https://charts.example.test/charts/abc',
                caption: 'Top 1 trending coins by 24h volume change: BTC +2.50%.',
                data,
            })

            expect(result.content).to.deep.equal([{
                type: 'text',
                text: 'Top 1 trending coins by 24h volume change: BTC +2.50%.\n\nhttps://charts.example.test/charts/abc\n\n' +
                    'Data: [{"symbol":"BTC","name":"Bitcoin","price":43250.4,"priceChange24h":2.5,"volumeChange24h":120}]',
            }])
            expect(result.structuredContent).to.have.deep.property('data', data)
        })

        it('marks errors and rounds the retry hint up to seconds', () => {
            const result = toCallToolResult({ status: 'error', kind: 'TooManyRequests', message: 'Request limit of 2 per minute reached.', retryAfterMs: 1500 })

            expect(result.isError).to.equal(true)
            expect(result.content).to.deep.equal([{ type: 'text', text: 'TooManyRequests: Request limit of 2 per minute reached. Retry after 2s.' }])
            expect(result.structuredContent).to.deep.equal({
                status: 'error',
                kind: 'TooManyRequests',
                message: 'Request limit of 2 per minute reached.',
                retryAfterMs: 1500,
            })
        })
    })

    describe('HTTP app', () => {
        let dir: string
        let components: Components
        let server: Server
        let base: string

        before(async () => {
            dir = await makeTmpDir()
            const config = new Config({ data: dir }, {
                CHARTD_BEARER_SECRET: SECRET,
                CHARTD_PUBLIC_URL: 'https://charts.example.test',
            })
            config.ensureDataDir()
            await writeFile(config.coinListPath, JSON.stringify(RECORDS))

            components = await createComponents(config, silentLogger, SECRET, new FakeProvider())
            const app = createHttpApp({ gateway: components.gateway, publisher: components.publisher, bearerSecret: SECRET })
            server = await runHTTP(app, 0)
            const address = server.address()
            if (address === null || typeof address === 'string') throw new Error('server is not listening on a port')
            base = `http://127.0.0.1:${address.port}`
        })

        after(async () => {
            await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())))
            components.index.close()
            await removeTmpDir(dir)
        })

        function rpc(method: string, params: object, token: string | null = SECRET): Promise<Response> {
            const headers: Record<string, string> = {
                'Content-Type': 'application/json',
                Accept: 'application/json, text/event-stream',
                'X-Caller-Id': 'http-test',
            }
            if (token !== null) headers.Authorization = `Bearer ${token}`
            return fetch(`${base}/mcp`, {
                method: 'POST',
                headers,
                body: JSON.stringify({ jsonrpc: '2.0', id: 1, method, params }),
            })
        }

        it('reports health', async () => {
            const res = await fetch(`${base}/health`)
            const body: unknown = await res.json()

            expect(res.status).to.equal(200)
            expect(body).to.deep.include({ status: 'ok', name: 'chartd', version: '0.1.0' })
            expect(body).to.have.nested.property('artifacts.totalItems')
        })

        it('refuses MCP calls without the bearer token', async () => {
            for (const token of [null, 'wrong-secret']) {
                const res = await rpc('tools/list', {}, token)
                const body: unknown = await res.json()

                expect(res.status).to.equal(401)
                expect(res.headers.get('www-authenticate')).to.equal('Bearer')
                expect(body).to.deep.equal({ jsonrpc: '2.0', error: { code: -32001, message: 'Unauthorized' }, id: null })
            }
        })

        it('lists both tools', async () => {
            const res = await rpc('tools/list', {})
            const body: unknown = await res.json()

            expect(res.status).to.equal(200)
            expect(body).to.have.nested.property('result.tools[0].name', 'crypto_price_chart')
            expect(body).to.have.nested.property('result.tools[1].name', 'crypto_heatmap')
        })

        it('renders a chart and serves it at the returned URL', async () => {
            const res = await rpc('tools/call', { name: 'crypto_price_chart', arguments: { symbol: 'BTC' } })
            const body: unknown = await res.json()

            expect(body).to.have.nested.property('result.structuredContent.status', 'ok')
            expect(body).to.have.nested.property('result.structuredContent.caption', 'Bitcoin (BTC) daily price chart, last 30 days.')

            const artifacts = components.index.expired(Number.MAX_SAFE_INTEGER, 0)
            expect(artifacts).to.have.length(1)
            expect(components.publisher.urlFor(artifacts[0].id)).to.equal(`https://charts.example.test/charts/${artifacts[0].id}`)

            const chart = await fetch(`${base}/charts/${artifacts[0].id}`)
            expect(chart.status).to.equal(200)
            expect(chart.headers.get('content-type')).to.match(/^image\/svg\+xml/)
            expect(chart.headers.get('x-content-type-options')).to.equal('nosniff')
            expect((await chart.text()).startsWith('<svg ')).to.equal(true)
        })

        it('returns tool errors as MCP error results', async () => {
            const res = await rpc('tools/call', { name: 'crypto_price_chart', arguments: { symbol: 'NOTACOIN' } })
            const body: unknown = await res.json()

            expect(body).to.have.nested.property('result.isError', true)
            expect(body).to.have.nested.property('result.structuredContent.kind', 'UnknownAsset')
        })

        it('returns heatmap figures over MCP', async () => {
            const res = await rpc('tools/call', { name: 'crypto_heatmap', arguments: { limit: 2 } })
            const body: unknown = await res.json()

            expect(body).to.have.nested.property('result.structuredContent.status', 'ok')
            expect(body).to.have.nested.deep.property('result.structuredContent.data[0]', {
                symbol: 'BTC',
                name: 'Bitcoin',
                price: 43250.4,
                priceChange24h: 2.5,
                volumeChange24h: 120,
            })
            expect(body).to.have.nested.property('result.structuredContent.data[1].symbol', 'ETH')
        })

        it('answers 404 for unknown charts', async () => {
            const res = await fetch(`${base}/charts/0123456789abcdef-zz`)

            expect(res.status).to.equal(404)
            expect(await res.text()).to.equal('Chart not found')
        })
    })
})
