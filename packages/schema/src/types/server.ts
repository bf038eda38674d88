import type { Hookable } from 'hookable'
import type { AssetEvent, AssetId, AssetPath, AssetPathInput, AssetType, DependencyEdge, GroupLoadStatus, LoadState } from './asset'
import type { DependencyPolicy, StowageOptions } from './config'
import type { AssetHandle, AssetRef, HandleLike } from './handle'
import type { AssetServerHooks } from './hooks'
import type { SourceIO } from './io'
import type { AssetDerivation, AssetLoader, AssetSerializer } from './loader'

export interface AssetStoreEntry<T> {
  readonly id: AssetId<T>
  readonly value: T
  /** 值版本，每次原地替换 +1 */
  readonly generation: number
  readonly incarnation: number
  /** best-effort 策略下依赖失败仍被标记为 loaded */
  readonly degraded: boolean
}

/**
 * 类型化资产存储的只读视图
 * 写入只能经过 AssetServer（load / add / set）
 */
export interface AssetStore<T> {
  readonly type: AssetType<T>
  readonly size: number
  has(ref: AssetRef<T>): boolean
  get(ref: AssetRef<T>): T | undefined
  getEntry(ref: AssetRef<T>): AssetStoreEntry<T> | undefined
  /** 原地修改，下次 update() 时发出 modified */
  getMut(ref: AssetRef<T>): T | undefined
  ids(): AssetId<T>[]
  refCount(ref: AssetRef<T>): number
  [Symbol.iterator](): IterableIterator<[AssetId<T>, T]>
}

export interface LoadOptions {
  /** 覆盖配置中的依赖失败策略 */
  policy?: DependencyPolicy
}

export interface LoadFolderOptions extends LoadOptions {
  source?: string
}

export interface AddAssetOptions {
  /** 指定 id，默认随机生成 */
  id?: AssetId | string
}

export interface AssetServer {
  /** 名称 */
  __name: string

  /** 配置 */
  options: StowageOptions
  /** 钩子 */
  hooks: Hookable<AssetServerHooks>
  hook: AssetServer['hooks']['hook']
  callHook: AssetServer['hooks']['callHook']
  /** 在当前 server 上下文中运行 */
  runWithContext: <R>(fn: () => R) => R

  // 注册
  registerSource: (name: string, io: SourceIO) => void
  /** 重复注册同一类型返回已有存储 */
  registerAssetType: <T>(type: AssetType<T>) => AssetStore<T>
  assets: <T>(type: AssetType<T>) => AssetStore<T>
  registerLoader: <T>(loader: AssetLoader<T>) => void
  registerSerializer: <T>(serializer: AssetSerializer<T>) => void
  registerDerivation: <T>(derivation: AssetDerivation<T>) => void

  // 加载
  load: <T>(type: AssetType<T>, path: AssetPathInput, options?: LoadOptions) => AssetHandle<T>
  loadUntyped: (path: AssetPathInput, options?: LoadOptions) => AssetHandle<unknown>
  loadFolder: (dir: string, options?: LoadFolderOptions) => Promise<AssetHandle<unknown>[]>
  /** 等待资产进入终态（loaded / failed / unloaded） */
  whenSettled: (ref: AssetRef) => Promise<LoadState>
  add: <T>(type: AssetType<T>, value: T, options?: AddAssetOptions) => AssetHandle<T>
  set: <T>(type: AssetType<T>, ref: AssetRef<T>, value: T) => void
  /** 类型校验后的句柄，类型不符时返回 undefined */
  typed: <T>(handle: AssetHandle, type: AssetType<T>) => AssetHandle<T> | undefined
  upgrade: <T>(handle: HandleLike<T>) => AssetHandle<T> | undefined

  // 查询
  getLoadState: (ref: AssetRef) => LoadState
  getGroupLoadState: (refs: AssetRef[]) => GroupLoadStatus
  getHandlePath: (ref: AssetRef) => AssetPath | undefined
  getTypeName: (ref: AssetRef) => string | undefined
  getDependencies: (ref: AssetRef) => DependencyEdge[]
  getDependents: (ref: AssetRef) => AssetId[]

  // 变更
  reload: (path: AssetPathInput) => Promise<void>
  unload: (path: AssetPathInput) => Promise<void>
  save: <T>(type: AssetType<T>, path: AssetPathInput, value: T) => Promise<void>
  /** 同步点：处理删除队列，发出 getMut 产生的 modified */
  update: () => Promise<AssetEvent[]>

  close: () => Promise<void>
}
