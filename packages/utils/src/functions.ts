/**
 * 创建一个防抖函数
 */
export function debounce<A extends unknown[]>(fn: (...args: A) => void, delay: number): ((...args: A) => void) & { cancel: () => void } {
  let timer: NodeJS.Timeout | null = null
  const debounced = (...args: A): void => {
    if (timer)
      clearTimeout(timer)
    timer = setTimeout(() => {
      timer = null
      fn(...args)
    }, delay)
  }
  debounced.cancel = (): void => {
    if (timer) {
      clearTimeout(timer)
      timer = null
    }
  }
  return debounced
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  settled: () => boolean
}

/**
 * 创建一个只会 resolve 的完成信号
 */
export function createDeferred<T>(): Deferred<T> {
  let done = false
  let resolveFn: (value: T) => void = () => {}
  const promise = new Promise<T>((resolve) => {
    resolveFn = resolve
  })
  return {
    promise,
    resolve: (value) => {
      if (done)
        return
      done = true
      resolveFn(value)
    },
    settled: () => done,
  }
}
