export { ToolGateway, chartKey, credentialMatches } from './gateway.js';
export type { ToolCall, ToolResult, ChartSuccess, ChartFailure, GatewayDeps, GatewayOptions } from './gateway.js';
export { chartCaption, heatmapCaption, heatmapEntries, rankByVolumeChange } from './format.js';
export type { HeatmapEntry } from './format.js';
