export interface ProducedAssetMeta {
  /** AssetId.uuid */
  id: string
  label: string | null
  /** AssetType.name */
  type: string
  /** 依赖路径（规范化字符串） */
  dependencies: string[]
}

export interface DerivedArtifactMeta {
  id: string
  /** 派生产物在导入目标中的路径 */
  path: string
  serializer: string
  /** 生成时源文件的指纹 */
  sourceFingerprint: string
}

/**
 * 每个数据源持久化的元数据
 */
export interface AssetSourceMeta {
  version: 1
  /** 源路径（不含标签） */
  source: string
  /** 源字节的内容哈希 */
  fingerprint: string
  /** 使用的加载器 */
  loader: string
  produced: ProducedAssetMeta[]
  derived: DerivedArtifactMeta[]
}
