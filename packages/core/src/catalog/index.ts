export { AssetCatalog } from './catalog.js';
export type { CoinMapSource } from './catalog.js';
export { CatalogSnapshot, CoinRecordSchema, parseSnapshot, readSnapshotFile, writeSnapshotFile, normalizeName } from './snapshot.js';
export type { CoinRecord, SnapshotLoad } from './snapshot.js';
