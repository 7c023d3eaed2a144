/**
 * artifact-store module: immutable, sequenced stage outputs.
 */

export type { ArtifactStore } from './artifact-store.js'
export { SqliteArtifactStore, createArtifactStore } from './artifact-store-impl.js'
export type { ArtifactStoreOptions } from './artifact-store-impl.js'
export { formatArtifactRef, parseArtifactRef, isSameArtifact } from './artifact-ref.js'
