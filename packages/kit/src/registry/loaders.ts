import type { AssetLoader, AssetPath, AssetType } from '@stowage/schema'
import micromatch from 'micromatch'
import { getAssetPathExtensions } from '../asset/path'
import { useLogger } from '../logger'

export interface LoaderRegistry {
  register: <T>(loader: AssetLoader<T>) => void
  /**
   * 按 patterns / matches -> 扩展名（长扩展名优先）解析加载器
   * 指定 type 时优先返回产出该类型的加载器
   */
  resolve: (path: AssetPath, type?: AssetType) => AssetLoader | undefined
  get: (name: string) => AssetLoader | undefined
  list: () => AssetLoader[]
}

export function createLoaderRegistry(): LoaderRegistry {
  const loaders: AssetLoader[] = []
  const byExtension = new Map<string, AssetLoader[]>()
  const logger = useLogger('stowage:loaders')

  const pickByType = (candidates: AssetLoader[], type: AssetType | undefined): AssetLoader | undefined => {
    if (!candidates.length) {
      return undefined
    }
    // 后注册的优先
    const ordered = [...candidates].reverse()
    if (type) {
      const typed = ordered.find(loader => loader.type.name === type.name)
      if (typed) {
        return typed
      }
    }
    return ordered[0]
  }

  return {
    register: (loader) => {
      const existing = loaders.findIndex(item => item.name === loader.name)
      if (existing >= 0) {
        logger.debug(`Replacing loader "${loader.name}"`)
        const [previous] = loaders.splice(existing, 1)
        for (const list of byExtension.values()) {
          const index = list.indexOf(previous)
          if (index >= 0) {
            list.splice(index, 1)
          }
        }
      }
      loaders.push(loader)
      for (const extension of loader.extensions) {
        const key = extension.replace(/^\./, '').toLowerCase()
        const list = byExtension.get(key) ?? []
        list.push(loader)
        byExtension.set(key, list)
      }
    },
    resolve: (path, type) => {
      const matched = loaders.filter((loader) => {
        if (loader.matches?.(path)) {
          return true
        }
        return !!loader.patterns?.length && micromatch.isMatch(path.path, loader.patterns, { dot: true })
      })
      const byPattern = pickByType(matched, type)
      if (byPattern) {
        return byPattern
      }

      for (const extension of getAssetPathExtensions(path)) {
        const loader = pickByType(byExtension.get(extension) ?? [], type)
        if (loader) {
          return loader
        }
      }
      return undefined
    },
    get: name => loaders.find(loader => loader.name === name),
    list: () => [...loaders],
  }
}
