import { describe, expect, it } from 'vitest'
import { createAssetId, Handle, idOf, isHandleLike } from '../src'
import { createRefCounter } from '../src/internal'

describe('handle', () => {
  it('strong 句柄参与计数', () => {
    const refs = createRefCounter()
    const id = createAssetId('a')
    refs.track(id, 1)

    const handle = Handle.strong(id, 1, refs)
    const clone = handle.clone()
    expect(refs.count(id)).toBe(2)

    handle.drop()
    handle.drop()
    expect(handle.isDropped).toBe(true)
    expect(refs.count(id)).toBe(1)

    clone.drop()
    expect(refs.count(id)).toBe(0)
    expect(refs.drainZeroed()).toEqual([id])
    expect(refs.drainZeroed()).toEqual([])
  })

  it('weak 句柄不参与计数', () => {
    const refs = createRefCounter()
    const id = createAssetId('a')
    refs.track(id, 1)
    const strong = Handle.strong(id, 1, refs)
    const weak = strong.downgrade()

    expect(weak.isStrong).toBe(false)
    expect(weak.clone().isStrong).toBe(false)
    weak.drop()
    expect(refs.count(id)).toBe(1)
  })

  it('过期 incarnation 的变更被忽略', () => {
    const refs = createRefCounter()
    const id = createAssetId('a')
    refs.track(id, 1)
    const stale = Handle.strong(id, 1, refs)
    refs.track(id, 2)
    expect(refs.count(id)).toBe(0)

    stale.drop()
    expect(refs.count(id)).toBe(0)
    expect(refs.incarnationOf(id)).toBe(2)
  })

  it('clone of a dropped handle is weak', () => {
    const refs = createRefCounter()
    const id = createAssetId('a')
    refs.track(id, 1)
    const handle = Handle.strong(id, 1, refs)
    handle.drop()
    expect(handle.clone().isStrong).toBe(false)
    expect(handle.retype<number>().isStrong).toBe(false)
  })

  it('should serialize to id and kind', () => {
    const handle = Handle.weak(createAssetId('a'), 3)
    expect(JSON.stringify(handle)).toBe('{"id":"a","kind":"weak"}')
  })

  it('idOf accepts ids and handles', () => {
    const id = createAssetId('a')
    const handle = Handle.weak(id, 1)
    expect(isHandleLike(handle)).toBe(true)
    expect(isHandleLike(id)).toBe(false)
    expect(idOf(handle)).toBe(id)
    expect(idOf(id)).toBe(id)
  })
})

describe('ref counter', () => {
  it('requeue 与 forget', () => {
    const refs = createRefCounter()
    const id = createAssetId('a')
    refs.track(id, 1)
    refs.requeue(id)
    expect(refs.drainZeroed()).toEqual([id])

    refs.requeue(id)
    refs.forget(id)
    expect(refs.drainZeroed()).toEqual([])
    refs.requeue(id)
    expect(refs.drainZeroed()).toEqual([])
  })

  it('计数恢复后不会被删除', () => {
    const refs = createRefCounter()
    const id = createAssetId('a')
    refs.track(id, 1)
    Handle.strong(id, 1, refs).drop()
    const again = Handle.strong(id, 1, refs)
    expect(refs.drainZeroed()).toEqual([])
    expect(again.isStrong).toBe(true)
  })
})
