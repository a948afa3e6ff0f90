import { expect } from 'chai'
import { renderPriceChart, renderHeatmap, blockValue, changeColor, maxLogChange } from '../src/render/index.js'
import { escapeXml, formatCompact, formatPercent, formatPrice, formatTime, niceTicks, px } from '../src/render/svg.js'
import { ChartError } from '../src/errors.js'
import type { ChartStyle, Icon, PriceSeries, TrendingCoin } from '../src/types.js'
import { DAY_MS, TRENDING, makeCandles, thrown } from './helpers.js'

const STYLE: ChartStyle = { theme: 'light', size: 'medium', overlayIcon: true }
const LABELS = { title: 'Bitcoin (BTC) Price & Volume', subtitle: 'Daily candles, last 30 days, USD' }
const ICON: Icon = { bytes: Buffer.from('png'), contentType: 'image/png', placeholder: false }

function series(count = 10): PriceSeries {
    return { assetId: '1', interval: 'daily', range: { kind: 'relative', days: count }, candles: makeCandles(count) }
}

function count(haystack: string, needle: string): number {
    return haystack.split(needle).length - 1
}

describe('svg helpers', () => {
    it('formats prices by magnitude', () => {
        expect(formatPrice(43250.4)).to.equal('43,250')
        expect(formatPrice(12.5)).to.equal('12.50')
        expect(formatPrice(0.000123456)).to.equal('0.0001235')
        expect(formatPrice(0)).to.equal('0')
    })

    it('formats percentages with a sign, and zero as --', () => {
        expect(formatPercent(3.14159)).to.equal('+3.14%')
        expect(formatPercent(-2.5)).to.equal('-2.50%')
        expect(formatPercent(0)).to.equal('--')
    })

    it('formats volumes compactly', () => {
        expect(formatCompact(1234567)).to.equal('1.23M')
        expect(formatCompact(2500)).to.equal('2.5K')
        expect(formatCompact(42)).to.equal('42')
    })

    it('picks round ticks', () => {
        expect(niceTicks(0, 10, 5)).to.deep.equal([0, 2, 4, 6, 8, 10])
        expect(niceTicks(5, 5)).to.deep.equal([5])
    })

    it('labels time in UTC', () => {
        const ts = Date.UTC(2024, 0, 5, 13)
        expect(formatTime(ts, false)).to.equal('2024-01-05')
        expect(formatTime(ts, true)).to.equal('01-05 13:00')
    })

    it('escapes markup and rounds coordinates', () => {
        expect(escapeXml(`<a href="x">'&'</a>`)).to.equal('&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;')
        expect(px(12)).to.equal('12')
        expect(px(12.34)).to.equal('12.3')
        expect(px(12.96)).to.equal('13')
    })
})

describe('renderPriceChart', () => {
    it('produces an SVG of the requested size', () => {
        const svg = renderPriceChart(series(), ICON, STYLE, LABELS).toString('utf-8')

        expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="1200" height="600" viewBox="0 0 1200 600">')).to.equal(true)
        expect(svg).to.include('<rect width="1200" height="600" fill="#ffffff"/>')
        expect(svg.endsWith('</svg>\n')).to.equal(true)
    })

    it('uses the small and large sizes', () => {
        const small = renderPriceChart(series(), null, { ...STYLE, size: 'small' }, LABELS).toString('utf-8')
        const large = renderPriceChart(series(), null, { ...STYLE, size: 'large' }, LABELS).toString('utf-8')

        expect(small).to.include('width="800" height="400"')
        expect(large).to.include('width="1600" height="800"')
    })

    it('is deterministic', () => {
        const a = renderPriceChart(series(), ICON, STYLE, LABELS)
        const b = renderPriceChart(series(), ICON, STYLE, LABELS)

        expect(a.equals(b)).to.equal(true)
    })

    it('draws one body and one volume bar per candle', () => {
        const svg = renderPriceChart(series(12), null, STYLE, LABELS).toString('utf-8')

        expect(count(svg, '<rect x="')).to.equal(24)
        expect(svg).to.include('<g fill="rgba(0,0,255,0.5)">')
    })

    it('colours rising and falling candles differently', () => {
        const candles = makeCandles(2)
        const falling = { ...candles[1], open: 110, close: 100, high: 111, low: 99 }
        const svg = renderPriceChart({ ...series(), candles: [candles[0], falling] }, null, STYLE, LABELS).toString('utf-8')

        expect(svg).to.include('stroke="#26a69a"')
        expect(svg).to.include('stroke="#ef5350"')
    })

    it('escapes the title and subtitle', () => {
        const svg = renderPriceChart(series(), null, STYLE, { title: 'A & B <C>', subtitle: '"quoted"' }).toString('utf-8')

        expect(svg).to.include('>A &amp; B &lt;C&gt;</text>')
        expect(svg).to.include('>&quot;quoted&quot;</text>')
    })

    it('embeds the icon when the overlay is on', () => {
        const svg = renderPriceChart(series(), ICON, STYLE, LABELS).toString('utf-8')

        expect(svg).to.include('href="data:image/png;base64,cG5n"')
    })

    it('leaves the icon out when the overlay is off or there is no icon', () => {
        const off = renderPriceChart(series(), ICON, { ...STYLE, overlayIcon: false }, LABELS).toString('utf-8')
        const none = renderPriceChart(series(), null, STYLE, LABELS).toString('utf-8')

        expect(off).to.not.include('<image')
        expect(none).to.not.include('<image')
    })

    it('adds the watermark when given', () => {
        const svg = renderPriceChart(series(), null, STYLE, { ...LABELS, watermark: 'chartd' }).toString('utf-8')

        expect(svg).to.include('fill="rgba(100,100,100,0.3)" text-anchor="end">chartd</text>')
    })

    it('uses the dark palette', () => {
        const svg = renderPriceChart(series(), null, { ...STYLE, theme: 'dark' }, LABELS).toString('utf-8')

        expect(svg).to.include('fill="#111827"/>')
    })

    it('labels hourly charts with the hour', () => {
        const hourly: PriceSeries = {
            assetId: '1',
            interval: 'hourly',
            range: { kind: 'relative', days: 1 },
            candles: makeCandles(6, Date.UTC(2024, 0, 5, 13), 60 * 60 * 1000),
        }
        const svg = renderPriceChart(hourly, null, STYLE, LABELS).toString('utf-8')

        expect(svg).to.include('>01-05 13:00</text>')
    })

    it('handles a flat series', () => {
        const flat = makeCandles(5).map(c => ({ ...c, open: 10, high: 10, low: 10, close: 10, volume: 0 }))
        const svg = renderPriceChart({ ...series(), candles: flat }, null, STYLE, LABELS).toString('utf-8')

        expect(svg).to.not.include('NaN')
        expect(svg).to.not.include('Infinity')
    })

    it('rejects an empty series', () => {
        const error = thrown(() => renderPriceChart({ ...series(), candles: [] }, null, STYLE, LABELS))

        expect(error).to.be.instanceOf(ChartError)
        expect(error).to.have.property('kind', 'RenderError')
        expect(error).to.have.property('message', 'No price data is available for the requested range.')
    })

    it('rejects non-finite values', () => {
        const candles = makeCandles(3)
        candles[1] = { ...candles[1], close: Number.NaN }

        const error = thrown(() => renderPriceChart({ ...series(), candles }, null, STYLE, LABELS))

        expect(error).to.have.property('kind', 'RenderError')
        expect(error).to.have.property('message', 'The price series contains invalid values.')
    })

    it('spaces candles evenly across the plot', () => {
        const candles = makeCandles(2, Date.UTC(2024, 0, 1), DAY_MS)
        const svg = renderPriceChart({ ...series(), candles }, null, STYLE, LABELS).toString('utf-8')

        // plot spans 84..1176, two slots of 546
        expect(svg).to.include('<line x1="357" y1="64" x2="357" y2="564"')
    })
})

describe('heatmap colours', () => {
    it('clamps block values', () => {
        expect(blockValue(0)).to.equal(1)
        expect(blockValue(Number.NaN)).to.equal(1)
        expect(blockValue(-40)).to.equal(40)
        expect(blockValue(5000)).to.equal(2000)
    })

    it('scales colour intensity on a log scale', () => {
        expect(changeColor(5, Math.log(10))).to.equal('rgb(0, 97, 0)')
        expect(changeColor(-10, Math.log(10))).to.equal('rgb(51, 0, 0)')
        expect(changeColor(0.5, Math.log(10))).to.equal('rgb(100, 100, 100)')
        expect(changeColor(-1, Math.log(10))).to.equal('rgb(100, 100, 100)')
    })

    it('takes the largest move in either direction', () => {
        expect(maxLogChange([5, -10, 0.5])).to.equal(Math.log(10))
        expect(maxLogChange([])).to.equal(Math.log(2))
    })
})

describe('renderHeatmap', () => {
    const COINS: TrendingCoin[] = [
        { id: '1', symbol: 'AAA', name: 'Alpha', price: 43250.4, priceChange24h: 2.5, volumeChange24h: 2000 },
        { id: '2', symbol: 'BBB', name: 'Beta', price: 0.5, priceChange24h: -1.25, volumeChange24h: 1 },
        { id: '3', symbol: 'CCC', name: 'Gamma', price: 2, priceChange24h: 1, volumeChange24h: 30 },
    ]

    it('draws one rounded block per coin', () => {
        const svg = renderHeatmap(TRENDING, STYLE).toString('utf-8')

        expect(count(svg, 'rx="5"')).to.equal(3)
        expect(svg).to.include('width="1200" height="600"')
    })

    it('shrinks labels with the block', () => {
        const svg = renderHeatmap(COINS, STYLE).toString('utf-8')

        expect(svg).to.include('>43250.40 (+2.50%)</text>')
        expect(svg).to.include('>+1.00%</text>')
        expect(svg).to.include('>BBB</text>')
        expect(svg).to.not.include('-1.25%')
    })

    it('colours by price change', () => {
        const svg = renderHeatmap(COINS, STYLE).toString('utf-8')

        expect(svg).to.include('fill="rgb(0, 51, 0)"/>')
        expect(svg).to.include('fill="rgb(100, 100, 100)"/>')
    })

    it('escapes symbols', () => {
        const svg = renderHeatmap([{ ...COINS[0], symbol: 'A<B' }], STYLE).toString('utf-8')

        expect(svg).to.include('>A&lt;B</text>')
    })

    it('rejects an empty list', () => {
        const error = thrown(() => renderHeatmap([], STYLE))

        expect(error).to.have.property('kind', 'RenderError')
        expect(error).to.have.property('message', 'No trending data is available right now.')
    })

    it('rejects non-finite values', () => {
        const error = thrown(() => renderHeatmap([{ ...COINS[0], price: Number.POSITIVE_INFINITY }], STYLE))

        expect(error).to.have.property('message', 'The trending data contains invalid values.')
    })
})
