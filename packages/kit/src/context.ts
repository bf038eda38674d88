import type { AssetServer } from '@stowage/schema'
import { AsyncLocalStorage } from 'node:async_hooks'
import { createContext } from 'unctx'

// 异步本地存储上下文，加载器与钩子在其中运行
const asyncAssetServerStorage = createContext<AssetServer>({
  asyncContext: true,
  AsyncLocalStorage,
})

// 获取当前 AssetServer，不存在时抛出
export function useAssetServer(): AssetServer {
  const instance = asyncAssetServerStorage.tryUse()
  if (!instance) {
    throw new Error('AssetServer instance is unavailable!')
  }
  return instance
}

export function tryUseAssetServer(): AssetServer | null {
  return asyncAssetServerStorage.tryUse()
}

// 在 AssetServer 上下文中运行指定函数
export function runWithAssetServerContext<R>(server: AssetServer, fn: () => R): R {
  return asyncAssetServerStorage.call(server, fn)
}
