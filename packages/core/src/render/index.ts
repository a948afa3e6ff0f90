export { renderPriceChart } from './chart.js';
export type { ChartLabels } from './chart.js';
export { renderHeatmap, blockValue, changeColor, maxLogChange } from './heatmap.js';
export { THEMES, SIZES } from './svg.js';
export type { Palette } from './svg.js';
