import type { AssetPath, AssetSourceMeta, DerivedArtifactMeta, MetaStorage, ProducedAssetMeta } from '@stowage/schema'
import { sourceKeyOf } from '../asset/path'
import { MetaPersistError } from '../errors'
import { useLogger } from '../logger'
import { fingerprintBytes } from './fingerprint'

export interface ImportOutcome<R> {
  loader: string
  produced: ProducedAssetMeta[]
  derived?: DerivedArtifactMeta[]
  result: R
}

export interface GetOrImportOptions<R> {
  path: AssetPath
  bytes: Uint8Array
  /** 忽略指纹强制导入（首次加载值尚未进入存储时） */
  force?: boolean
  /** 由调用方在确认提交后调用 save 落盘 */
  deferSave?: boolean
  run: (fingerprint: string) => Promise<ImportOutcome<R>>
}

export type GetOrImportResult<R>
  = | { status: 'cached', meta: AssetSourceMeta }
    | { status: 'imported', meta: AssetSourceMeta, result: R }

export interface MetadataStoreOptions {
  storage: MetaStorage
  /** false 时只保存在内存 */
  persist?: boolean
  onError?: (key: string, error: MetaPersistError) => void | Promise<void>
}

export interface MetadataStore {
  getOrImport: <R>(options: GetOrImportOptions<R>) => Promise<GetOrImportResult<R>>
  get: (path: AssetPath) => Promise<AssetSourceMeta | undefined>
  peek: (path: AssetPath) => AssetSourceMeta | undefined
  save: (path: AssetPath, meta: AssetSourceMeta) => Promise<void>
  forget: (path: AssetPath) => void
}

export function createMetadataStore(options: MetadataStoreOptions): MetadataStore {
  const { storage, persist = true, onError } = options
  const records = new Map<string, AssetSourceMeta>()
  const logger = useLogger('stowage:meta')

  const get = async (path: AssetPath): Promise<AssetSourceMeta | undefined> => {
    const key = sourceKeyOf(path)
    const cached = records.get(key)
    if (cached || !persist) {
      return cached
    }
    const stored = await storage.read(key)
    if (stored) {
      records.set(key, stored)
    }
    return stored
  }

  const save = async (key: string, meta: AssetSourceMeta): Promise<void> => {
    // 内存记录始终更新，落盘失败时磁盘上保留旧记录
    records.set(key, meta)
    if (!persist) {
      return
    }
    try {
      await storage.write(key, meta)
    }
    catch (cause) {
      const error = new MetaPersistError(key, { cause })
      logger.warn(error.message)
      await onError?.(key, error)
    }
  }

  return {
    getOrImport: async ({ path, bytes, force = false, deferSave = false, run }) => {
      const key = sourceKeyOf(path)
      const fingerprint = fingerprintBytes(bytes)
      const previous = await get(path)
      if (previous && previous.fingerprint === fingerprint && !force) {
        logger.debug(`Metadata of "${key}" is up to date`)
        return { status: 'cached', meta: previous }
      }

      // run 失败时直接抛出，不写入任何记录
      const outcome = await run(fingerprint)
      const meta: AssetSourceMeta = {
        version: 1,
        source: key,
        fingerprint,
        loader: outcome.loader,
        produced: outcome.produced,
        derived: outcome.derived ?? [],
      }
      if (!deferSave) {
        await save(key, meta)
      }
      return { status: 'imported', meta, result: outcome.result }
    },
    get,
    peek: path => records.get(sourceKeyOf(path)),
    save: (path, meta) => save(sourceKeyOf(path), meta),
    forget: (path) => {
      records.delete(sourceKeyOf(path))
    },
  }
}
