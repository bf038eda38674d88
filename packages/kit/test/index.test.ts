import { describe, expect, it } from 'vitest'
import * as kit from '../src'
import * as internal from '../src/internal'

describe('kit exports', () => {
  it('根入口暴露资产 API', () => {
    expect(kit.parseAssetPath).toBeTypeOf('function')
    expect(kit.defineAssetType).toBeTypeOf('function')
    expect(kit.createFileSource).toBeTypeOf('function')
    expect(kit.createMemorySource).toBeTypeOf('function')
    expect(kit.loadStowageConfig).toBeTypeOf('function')
    expect(kit.useLogger).toBeTypeOf('function')
    expect(kit.useAssetServer).toBeTypeOf('function')
    expect(kit.tryUseAssetServer).toBeTypeOf('function')

    expect('runWithAssetServerContext' in kit).toBe(false)
    expect('createDependencyGraph' in kit).toBe(false)
    expect('Assets' in kit).toBe(false)
  })

  it('internal 子路径暴露内核 API', () => {
    expect(internal.runWithAssetServerContext).toBeTypeOf('function')
    expect(internal.createDependencyGraph).toBeTypeOf('function')
    expect(internal.createMetadataStore).toBeTypeOf('function')
    expect(internal.Assets).toBeTypeOf('function')
  })

  it('logger 默认使用 stowage 标签', () => {
    expect(kit.useLogger().options.defaults.tag).toBe('stowage')
    expect(kit.useLogger('stowage:meta').options.defaults.tag).toBe('stowage:meta')
  })

  it('上下文之外没有 server', () => {
    expect(kit.tryUseAssetServer()).toBeNull()
    expect(() => kit.useAssetServer()).toThrowError('AssetServer instance is unavailable!')
  })
})
