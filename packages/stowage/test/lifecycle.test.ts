import type { AssetEvent } from '@stowage/schema'
import { AssetTypeMismatchError, createMemorySource, defineAssetType, DuplicateAssetIdError } from '@stowage/kit'
import { describe, expect, it } from 'vitest'
import { createAssetServer } from '../src'
import { createTestServer, errorKindOf, flush, MeshPart, Model, Text, textLoader, Texture } from './loaders'

const Counter = defineAssetType<{ count: number }>('counter')

describe('handles and removal', () => {
  it('最后一个 strong 句柄释放后在 update 时删除', async () => {
    const { server } = createTestServer({ 'a.txt': 'hello' })
    const handle = server.load(Text, 'a.txt')
    await server.whenSettled(handle)

    const weak = handle.downgrade()
    handle.drop()
    expect(server.assets(Text).get(weak)).toBe('hello')

    const events = await server.update()
    expect(events).toEqual([
      { type: 'removed', id: handle.id, assetType: 'text', path: { source: 'default', path: 'a.txt' }, generation: 0 },
    ])
    expect(server.assets(Text).get(weak)).toBeUndefined()
    expect(server.getLoadState(weak)).toEqual({ status: 'unloaded' })
    expect(server.upgrade(weak)).toBeUndefined()
  })

  it('加载中释放的资产在加载完成后才删除', async () => {
    const { server } = createTestServer({ 'a.txt': 'hello' })
    const handle = server.load(Text, 'a.txt')
    handle.drop()
    expect(await server.update()).toEqual([])

    expect(await server.whenSettled(handle.id)).toEqual({ status: 'loaded', degraded: false })
    await flush()
    const events = await server.update()
    expect(events.map(event => event.type)).toEqual(['removed'])
    expect(server.assets(Text).size).toBe(0)
  })

  it('依赖随依赖方一起级联删除', async () => {
    const { server } = createTestServer({
      'models/mesh.gltf': JSON.stringify({ textures: ['a.png', 'b.png'], meshes: ['Mesh0'] }),
      'models/a.png': 'A',
      'models/b.png': 'B',
    })
    const handle = server.load(Model, 'models/mesh.gltf')
    await server.whenSettled(handle)
    await flush()

    handle.drop()
    const events = await server.update()
    expect(events.map(event => event.assetType).sort()).toEqual(['mesh', 'model', 'texture', 'texture'])
    expect(server.assets(Texture).size).toBe(0)
    expect(server.assets(MeshPart).size).toBe(0)
  })

  it('被其他句柄持有的依赖不会删除', async () => {
    const { server } = createTestServer({
      'models/mesh.gltf': JSON.stringify({ textures: ['a.png'] }),
      'models/a.png': 'A',
    })
    const texture = server.load(Texture, 'models/a.png')
    const handle = server.load(Model, 'models/mesh.gltf')
    await server.whenSettled(handle)
    await flush()

    handle.drop()
    await server.update()
    expect(server.assets(Texture).get(texture)).toEqual({ name: 'A' })
    expect(server.assets(Texture).refCount(texture)).toBe(1)
  })

  it('upgrade 弱句柄', async () => {
    const { server } = createTestServer({ 'a.txt': 'hello' })
    const handle = server.load(Text, 'a.txt')
    await server.whenSettled(handle)

    const strong = server.upgrade(handle.downgrade())
    expect(strong?.isStrong).toBe(true)
    expect(server.assets(Text).refCount(handle)).toBe(2)
  })
})

describe('programmatic assets', () => {
  it('add / set 的事件在 update 时发出', async () => {
    const { server } = createTestServer()
    const handle = server.add(Text, 'x')
    expect(server.assets(Text).get(handle)).toBe('x')
    expect(server.getLoadState(handle)).toEqual({ status: 'loaded', degraded: false })
    expect(server.getHandlePath(handle)).toBeUndefined()

    expect(await server.update()).toEqual([{ type: 'added', id: handle.id, assetType: 'text', generation: 0 }])
    expect(await server.update()).toEqual([])

    server.set(Text, handle, 'y')
    const events = await server.update()
    expect(events.map(event => [event.type, event.generation])).toEqual([['modified', 1]])
    expect(server.assets(Text).get(handle)).toBe('y')
  })

  it('getMut 产生 modified', async () => {
    const { server } = createTestServer()
    const store = server.registerAssetType(Counter)
    expect(server.registerAssetType(Counter)).toBe(store)

    const handle = server.add(Counter, { count: 0 })
    await server.update()

    const value = store.getMut(handle)
    if (value) {
      value.count = 5
    }
    const events = await server.update()
    expect(events.map(event => [event.type, event.assetType, event.generation])).toEqual([['modified', 'counter', 1]])
    expect(store.get(handle)).toEqual({ count: 5 })
  })

  it('指定的 id 不能重复', async () => {
    const { server } = createTestServer({ 'a.txt': 'hello' })
    const handle = server.add(Text, 'x', { id: 'fixed' })
    expect(handle.id.uuid).toBe('fixed')
    expect(() => server.add(Text, 'y', { id: 'fixed' })).toThrow(DuplicateAssetIdError)

    const loaded = server.load(Text, 'a.txt')
    expect(() => server.add(Text, 'z', { id: loaded.id })).toThrowError(`Asset id ${loaded.id.uuid} is already owned by "a.txt"`)
  })

  it('set 校验 id 与类型', () => {
    const { server } = createTestServer()
    const handle = server.add(Text, 'x')
    expect(() => server.set(Counter, { uuid: handle.id.uuid }, { count: 1 })).toThrow(AssetTypeMismatchError)
    expect(() => server.set(Text, { uuid: 'missing' }, 'y')).toThrowError('Asset missing is not loaded')
  })

  it('释放后删除', async () => {
    const { server } = createTestServer()
    const handle = server.add(Text, 'x')
    handle.drop()
    const events = await server.update()
    expect(events.map(event => event.type)).toEqual(['added', 'removed'])
    expect(server.assets(Text).size).toBe(0)
  })
})

describe('unload', () => {
  it('卸载整个源，忽略标签', async () => {
    const { server } = createTestServer({ 'models/mesh.gltf': JSON.stringify({ meshes: ['Mesh0'] }) })
    const events: AssetEvent[] = []
    server.hook('asset:event', (event) => {
      events.push(event)
    })
    const handle = server.load(Model, 'models/mesh.gltf')
    await server.whenSettled(handle)
    await flush()
    events.length = 0

    await server.unload('models/mesh.gltf#Mesh0')
    expect(events.map(event => `${event.type}:${event.assetType}`)).toEqual(['removed:mesh', 'removed:model'])
    expect(server.getLoadState(handle)).toEqual({ status: 'unloaded' })
    expect(server.assets(Model).size).toBe(0)
  })

  it('重新加载后旧句柄失效', async () => {
    const { server } = createTestServer({ 'a.txt': 'hello' })
    const handle = server.load(Text, 'a.txt')
    await server.whenSettled(handle)
    await server.unload('a.txt')

    const again = server.load(Text, 'a.txt')
    await server.whenSettled(again)
    expect(again.incarnation).not.toBe(handle.incarnation)
    expect(server.assets(Text).get(handle)).toBeUndefined()
    expect(server.assets(Text).get(again)).toBe('hello')

    handle.drop()
    expect(server.assets(Text).refCount(again)).toBe(1)
  })

  it('取消进行中的加载', async () => {
    const io = createMemorySource({ files: { 'a.txt': 'x' }, latency: 20 })
    const server = createAssetServer({ sources: { default: io } })
    server.registerLoader(textLoader)

    const handle = server.load(Text, 'a.txt')
    await server.unload('a.txt')
    expect(errorKindOf(server.getLoadState(handle))).toBe('cancelled')
    expect(server.assets(Text).has(handle)).toBe(false)
  })
})

describe('close', () => {
  it('should cancel loads and reject new requests', async () => {
    const { server } = createTestServer({ 'a.txt': 'x' })
    let closed = 0
    server.hook('close', () => {
      closed++
    })
    const handle = server.load(Text, 'a.txt')

    await server.close()
    await server.close()
    expect(closed).toBe(1)
    expect(errorKindOf(server.getLoadState(handle))).toBe('cancelled')
    expect(() => server.load(Text, 'a.txt')).toThrowError('AssetServer is closed')
  })
})
