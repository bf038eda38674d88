/**
 * 资产标识
 * uuid 为稳定标识，T 仅用于类型推导
 */
export interface AssetId<T = unknown> {
  readonly uuid: string
  readonly __type?: T
}

/**
 * 资产类型描述
 * 通过 name 区分不同的类型化存储
 */
export interface AssetType<T = unknown> {
  readonly name: string
  readonly __value?: T
}

/** 默认数据源 */
export const DEFAULT_SOURCE = 'default'

/**
 * 资产路径：数据源 + 相对路径 + 可选标签
 */
export interface AssetPath {
  /** 数据源命名空间，如 default / local / network */
  readonly source: string
  /** 相对路径 */
  readonly path: string
  /** 子资产标签（一个源产出多个资产时使用） */
  readonly label?: string
}

export type AssetPathInput = string | AssetPath

export type LoadStatus
  = | 'requested'
    | 'reading'
    | 'parsing'
    | 'waiting'
    | 'loaded'
    | 'failed'
    | 'unloaded'

export type AssetErrorKind
  = | 'io'
    | 'loader-not-found'
    | 'deserialize'
    | 'dependency-failed'
    | 'cyclic-dependency'
    | 'duplicate-asset-id'
    | 'cancelled'
    | 'type-mismatch'
    | 'missing-label'
    | 'serializer-not-found'
    | 'type-not-registered'
    | 'meta-persist'

/** 加载失败原因 */
export interface AssetLoadError extends Error {
  readonly kind: AssetErrorKind
}

export type LoadState
  = | { status: 'requested' }
    | { status: 'reading' }
    | { status: 'parsing' }
    | { status: 'waiting', pending: number }
    | { status: 'loaded', degraded: boolean }
    | { status: 'failed', error: AssetLoadError }
    | { status: 'unloaded' }

export type GroupLoadStatus = 'loading' | 'loaded' | 'failed' | 'unloaded'

export interface DependencyEdge {
  dependent: AssetId
  dependency: AssetId | AssetPath
  required: boolean
}

export type AssetEventType = 'added' | 'modified' | 'removed'

/** 资产生命周期事件 */
export interface AssetEvent {
  type: AssetEventType
  id: AssetId
  /** 资产类型名 */
  assetType: string
  /** 来源路径（程序化插入的资产没有） */
  path?: AssetPath
  generation: number
}
