export { Assets, type AssetEntry, type InsertOptions, type InsertOutcome, isStoreOf } from './assets/assets'
export { runWithAssetServerContext } from './context'
export { createDependencyGraph, type DependencyGraph, type DependencyLink } from './graph/dependency-graph'
export { type AssetRefCounter, createRefCounter } from './handle/ref-counter'
export { writeAtomic } from './io/atomic'
export { normalizeOptions } from './loader/config'
export { importedArtifactHash } from './meta/fingerprint'
export { metaFilePath, parseSourceMeta } from './meta/storage'
export {
  createMetadataStore,
  type GetOrImportOptions,
  type GetOrImportResult,
  type ImportOutcome,
  type MetadataStore,
  type MetadataStoreOptions,
} from './meta/store'
export { createLoaderRegistry, type LoaderRegistry } from './registry/loaders'
export {
  createDerivationRegistry,
  createSerializerRegistry,
  type DerivationRegistry,
  type SerializerRegistry,
} from './registry/serializers'
