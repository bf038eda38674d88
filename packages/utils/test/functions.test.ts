import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createDeferred, debounce, normalizeSlashes, trimSlashes } from '../src'

describe('debounce', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })
  afterEach(() => {
    vi.useRealTimers()
  })

  it('连续调用只执行最后一次', () => {
    const calls: number[] = []
    const fn = debounce((value: number) => calls.push(value), 50)
    fn(1)
    fn(2)
    vi.advanceTimersByTime(49)
    fn(3)
    vi.advanceTimersByTime(50)
    expect(calls).toEqual([3])
  })

  it('cancel 丢弃等待中的调用', () => {
    const calls: number[] = []
    const fn = debounce((value: number) => calls.push(value), 50)
    fn(1)
    fn.cancel()
    vi.advanceTimersByTime(100)
    expect(calls).toEqual([])
  })
})

describe('createDeferred', () => {
  it('只 resolve 一次', async () => {
    const deferred = createDeferred<number>()
    expect(deferred.settled()).toBe(false)
    deferred.resolve(1)
    deferred.resolve(2)
    expect(deferred.settled()).toBe(true)
    await expect(deferred.promise).resolves.toBe(1)
  })
})

describe('strings', () => {
  it('normalizeSlashes', () => {
    expect(normalizeSlashes('a\\b\\c.png')).toBe('a/b/c.png')
  })

  it('trimSlashes', () => {
    expect(trimSlashes('./a/b/')).toBe('a/b')
    expect(trimSlashes('/a')).toBe('a')
    expect(trimSlashes('././a')).toBe('a')
  })
})
