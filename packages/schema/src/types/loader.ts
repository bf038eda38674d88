import type { AssetPath, AssetPathInput, AssetType } from './asset'
import type { AssetHandle } from './handle'

export interface DependencyOptions {
  /** 默认 true；可选依赖不会阻塞加载 */
  required?: boolean
}

export type DependencyInput = AssetPathInput | ({ path: AssetPathInput } & DependencyOptions)

export interface LoaderResult<T> {
  value: T
  dependencies?: DependencyInput[]
}

export interface LabeledAssetOptions {
  dependencies?: DependencyInput[]
}

/**
 * 加载器上下文
 */
export interface LoadContext {
  /** 当前加载的源路径（不含标签） */
  readonly path: AssetPath
  /** 加载被取消时触发 */
  readonly signal: AbortSignal
  /**
   * 嵌套加载，会被记录为当前资产的依赖
   * 返回 weak 句柄，依赖由当前资产持有
   */
  load: <U>(type: AssetType<U>, path: AssetPathInput, options?: DependencyOptions) => AssetHandle<U>
  loadUntyped: (path: AssetPathInput, options?: DependencyOptions) => AssetHandle<unknown>
  addDependency: (path: AssetPathInput, options?: DependencyOptions) => void
  /**
   * 产出带标签的子资产，随源资产一起提交
   * 返回 weak 句柄，可以嵌入源资产的值中
   */
  addLabeledAsset: <U>(label: string, type: AssetType<U>, value: U, options?: LabeledAssetOptions) => AssetHandle<U>
  hasLabeledAsset: (label: string) => boolean
  /** 读取同一数据源下其他文件的原始字节 */
  readBytes: (path: AssetPathInput) => Promise<Uint8Array>
}

/**
 * 将字节解析为资产值
 */
export interface AssetLoader<T = unknown> {
  readonly name: string
  readonly type: AssetType<T>
  /** 不带点的扩展名，支持复合扩展名如 `scene.json` */
  readonly extensions: string[]
  /** micromatch 匹配模式，优先于扩展名 */
  readonly patterns?: string[]
  matches?: (path: AssetPath) => boolean
  load: (bytes: Uint8Array, context: LoadContext) => LoaderResult<T> | Promise<LoaderResult<T>>
}

/**
 * 资产序列化器，tag 为稳定的类型标识
 */
export interface AssetSerializer<T = unknown> {
  readonly tag: string
  readonly type: AssetType<T>
  /** 产物扩展名（不带点） */
  readonly extension: string
  serialize(value: T): Uint8Array | Promise<Uint8Array>
}

export interface DerivationContext {
  readonly path: AssetPath
  readonly fingerprint: string
}

/**
 * 派生：在交给使用方之前把源资产转换为预处理产物
 */
export interface AssetDerivation<T = unknown> {
  readonly name: string
  readonly type: AssetType<T>
  derive(value: T, context: DerivationContext): T | Promise<T>
}
