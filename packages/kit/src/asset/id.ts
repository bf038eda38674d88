import type { AssetId, AssetPath } from '@stowage/schema'
import { createHash, randomUUID } from 'node:crypto'
import { formatAssetPath } from './path'

function toUuidLayout(hex: string): string {
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`
}

/**
 * 由路径派生稳定 id，同一路径在每次运行中得到相同 id
 */
export function assetIdFromPath<T = unknown>(path: AssetPath): AssetId<T> {
  const hex = createHash('sha256').update(formatAssetPath(path)).digest('hex')
  return { uuid: toUuidLayout(hex) }
}

/** 程序化插入的资产使用随机 id，也可以传入已有 uuid */
export function createAssetId<T = unknown>(uuid?: string): AssetId<T> {
  return { uuid: uuid ?? randomUUID() }
}

export function isSameAssetId(a: AssetId, b: AssetId): boolean {
  return a.uuid === b.uuid
}

export function typedAssetId<T>(id: AssetId): AssetId<T> {
  return { uuid: id.uuid }
}
