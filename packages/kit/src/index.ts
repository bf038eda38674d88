export { assetIdFromPath, createAssetId, isSameAssetId, typedAssetId } from './asset/id'
export {
  createAssetPath,
  formatAssetPath,
  getAssetPathExtensions,
  isSameAssetPath,
  parseAssetPath,
  resolveAssetPath,
  sourceKeyOf,
  withLabel,
  withoutLabel,
} from './asset/path'
export { defineAssetType } from './asset/type'
export { tryUseAssetServer, useAssetServer } from './context'
export {
  AssetError,
  AssetIoError,
  type AssetIoErrorCode,
  AssetLoadCancelledError,
  AssetTypeMismatchError,
  AssetTypeNotRegisteredError,
  CyclicDependencyError,
  DependencyFailedError,
  DeserializeError,
  DuplicateAssetIdError,
  isAssetError,
  LoaderNotFoundError,
  MetaPersistError,
  MissingLabelError,
  SerializerNotFoundError,
} from './errors'
export { Handle, idOf, isHandleLike } from './handle/handle'
export { createFileSource, type FileSourceOptions } from './io/file'
export { createMemorySource, type MemorySource, type MemorySourceOptions } from './io/memory'
export { loadStowageConfig, type LoadConfigOptions } from './loader/config'
export { useLogger } from './logger'
export { fingerprintBytes } from './meta/fingerprint'
export { createFileMetaStorage, createMemoryMetaStorage } from './meta/storage'
