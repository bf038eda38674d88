import type { AssetDerivation, AssetSerializer, AssetType } from '@stowage/schema'

export interface SerializerRegistry {
  register: <T>(serializer: AssetSerializer<T>) => void
  get: (type: AssetType) => AssetSerializer | undefined
  byTag: (tag: string) => AssetSerializer | undefined
}

/**
 * 按类型名索引，同一类型重复注册时覆盖
 */
export function createSerializerRegistry(): SerializerRegistry {
  const byType = new Map<string, AssetSerializer>()
  const byTag = new Map<string, AssetSerializer>()

  return {
    register: (serializer) => {
      const previous = byType.get(serializer.type.name)
      if (previous) {
        byTag.delete(previous.tag)
      }
      byType.set(serializer.type.name, serializer)
      byTag.set(serializer.tag, serializer)
    },
    get: type => byType.get(type.name),
    byTag: tag => byTag.get(tag),
  }
}

export interface DerivationRegistry {
  register: <T>(derivation: AssetDerivation<T>) => void
  /** 按注册顺序返回某类型的派生 */
  of: (type: AssetType) => AssetDerivation[]
}

export function createDerivationRegistry(): DerivationRegistry {
  const byType = new Map<string, AssetDerivation[]>()

  return {
    register: (derivation) => {
      const list = (byType.get(derivation.type.name) ?? []).filter(item => item.name !== derivation.name)
      list.push(derivation)
      byType.set(derivation.type.name, list)
    },
    of: type => [...(byType.get(type.name) ?? [])],
  }
}
