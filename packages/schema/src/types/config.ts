export type DependencyPolicy = 'fail-fast' | 'best-effort'

export interface MetaConfig {
  /** 元数据目录（相对 rootDir） */
  dir: string
  /** 是否落盘，关闭时只保存在内存 */
  persist: boolean
}

export interface ImportConfig {
  /** 开启后派生产物会被序列化写入 dir */
  enabled: boolean
  dir: string
}

export interface WatchConfig {
  enabled: boolean
  debounceMs: number
}

export interface DependenciesConfig {
  policy: DependencyPolicy
}

export interface ConfigSchema {
  /** 配置继承 */
  extends: string | string[]
  /** 项目根目录 */
  rootDir: string
  /** debug 模式 */
  debug: boolean
  /** default 数据源目录（相对 rootDir） */
  assetsDir: string
  /** 额外的命名数据源：名称 -> 目录 */
  sources: Record<string, string>
  meta: MetaConfig
  import: ImportConfig
  watch: WatchConfig
  dependencies: DependenciesConfig
}

export interface StowageConfig {
  extends?: string | string[]
  rootDir?: string
  debug?: boolean
  assetsDir?: string
  sources?: Record<string, string>
  meta?: Partial<MetaConfig>
  import?: Partial<ImportConfig>
  watch?: Partial<WatchConfig>
  dependencies?: Partial<DependenciesConfig>
}

export interface StowageOptions extends Omit<ConfigSchema, 'extends'> {
  /**
   * 配置文件路径
   * @private
   */
  __configFile?: string
  /** 运行模式 */
  __mode?: string
}
