/**
 * Chart artifact publishing
 */

export { ArtifactPublisher, artifactId } from './publisher.js';
export type { ChartArtifact, ArtifactContent, PublisherOptions } from './publisher.js';

export { FsArtifactStore } from './fs-store.js';
export type { ArtifactStore } from './store.js';
