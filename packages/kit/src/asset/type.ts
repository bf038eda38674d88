import type { AssetType } from '@stowage/schema'

export function defineAssetType<T>(name: string): AssetType<T> {
  if (!name.trim()) {
    throw new Error('Asset type name must not be empty')
  }
  return Object.freeze({ name })
}
