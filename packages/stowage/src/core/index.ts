import type { AssetServer, SourceIO, StowageConfig } from '@stowage/schema'
import { createFileMetaStorage, createFileSource, createMemoryMetaStorage, loadStowageConfig, useLogger } from '@stowage/kit'
import { DEFAULT_SOURCE } from '@stowage/schema'
import { resolve } from 'pathe'
import { createAssetServer } from './server'

export interface LoadStowageOptions {
  cwd?: string
  mode?: string
  /** 优先级最高的配置 */
  overrides?: StowageConfig
}

/**
 * 加载配置并创建 AssetServer
 * default 数据源为 <rootDir>/<assetsDir>，sources 中的每一项为额外的命名数据源
 */
export async function loadStowage(opts: LoadStowageOptions = {}): Promise<AssetServer> {
  // 1. 加载配置文件
  const options = await loadStowageConfig({
    cwd: opts.cwd,
    mode: opts.mode,
    overrides: opts.overrides,
  })

  // 2. 数据源
  const sources: Record<string, SourceIO> = {
    [DEFAULT_SOURCE]: createFileSource({ root: resolve(options.rootDir, options.assetsDir) }),
  }
  for (const [name, dir] of Object.entries(options.sources)) {
    sources[name] = createFileSource({ root: resolve(options.rootDir, dir) })
  }

  // 3. 元数据与导入目标
  const metaStorage = options.meta.persist
    ? createFileMetaStorage(resolve(options.rootDir, options.meta.dir))
    : createMemoryMetaStorage()
  const importIO = options.import.enabled
    ? createFileSource({ root: resolve(options.rootDir, options.import.dir) })
    : undefined

  // 4. 创建 server
  const server = createAssetServer({ options, sources, importIO, metaStorage })
  server.options.__configFile = options.__configFile
  server.options.__mode = options.__mode

  server.runWithContext(() => useLogger('stowage')).debug(`AssetServer ready at ${options.rootDir}`)
  return server
}
