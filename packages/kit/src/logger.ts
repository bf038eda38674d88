import type { ConsolaInstance, ConsolaOptions } from 'consola'
import { consola, LogLevels } from 'consola'
import { tryUseAssetServer } from './context'

export const logger = consola

/**
 * 带标签的 logger，默认标签为 `stowage`
 * 在 debug 开启的 AssetServer 上下文中调用时输出 debug 级别日志
 */
export function useLogger(tag = 'stowage', options: Partial<ConsolaOptions> = {}): ConsolaInstance {
  const server = tryUseAssetServer()
  if (server?.options.debug) {
    options.level = LogLevels.debug
  }
  return logger.create(options).withTag(tag)
}
