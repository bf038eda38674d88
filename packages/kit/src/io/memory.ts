import type { SourceChangeKind, SourceChangeListener, SourceIO } from '@stowage/schema'
import { trimSlashes } from '@stowage/utils'
import { AssetIoError } from '../errors'

export interface MemorySource extends SourceIO {
  /** 写入文件并通知监听者 */
  set: (path: string, content: Uint8Array | string) => void
  remove: (path: string) => void
  has: (path: string) => boolean
  /** 每个路径被读取的次数 */
  reads: (path: string) => number
  files: () => string[]
}

export interface MemorySourceOptions {
  files?: Record<string, Uint8Array | string>
  /** 模拟 IO 延迟（毫秒） */
  latency?: number
}

const encoder = new TextEncoder()

function toBytes(content: Uint8Array | string): Uint8Array {
  return typeof content === 'string' ? encoder.encode(content) : content
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Aborted')
}

function delay(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal))
      return
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(signal ? abortReason(signal) : new Error('Aborted'))
    }
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * 内存数据源，用于测试与程序化生成的资产
 */
export function createMemorySource(options: MemorySourceOptions = {}): MemorySource {
  const files = new Map<string, Uint8Array>()
  const readCounts = new Map<string, number>()
  const listeners = new Map<string, Set<SourceChangeListener>>()
  const latency = options.latency ?? 0

  const key = (path: string): string => trimSlashes(path)

  const notify = (path: string, kind: SourceChangeKind): void => {
    for (const listener of listeners.get(path) ?? []) {
      listener({ kind, path })
    }
  }

  for (const [path, content] of Object.entries(options.files ?? {})) {
    files.set(key(path), toBytes(content))
  }

  return {
    read: async (path, readOptions = {}) => {
      const normalized = key(path)
      readCounts.set(normalized, (readCounts.get(normalized) ?? 0) + 1)
      if (latency > 0) {
        await delay(latency, readOptions.signal)
      }
      const bytes = files.get(normalized)
      if (!bytes) {
        throw new AssetIoError(normalized, 'not-found')
      }
      return bytes.slice()
    },
    write: async (path, bytes) => {
      const normalized = key(path)
      const kind = files.has(normalized) ? 'change' : 'add'
      files.set(normalized, bytes.slice())
      notify(normalized, kind)
    },
    readDirectory: async (dir) => {
      const prefix = key(dir)
      return [...files.keys()]
        .filter(path => !prefix || path.startsWith(`${prefix}/`))
        .sort()
    },
    watch: (path, listener) => {
      const normalized = key(path)
      const set = listeners.get(normalized) ?? new Set()
      set.add(listener)
      listeners.set(normalized, set)
      return async () => {
        set.delete(listener)
      }
    },
    set: (path, content) => {
      const normalized = key(path)
      const kind = files.has(normalized) ? 'change' : 'add'
      files.set(normalized, toBytes(content))
      notify(normalized, kind)
    },
    remove: (path) => {
      const normalized = key(path)
      if (files.delete(normalized)) {
        notify(normalized, 'unlink')
      }
    },
    has: path => files.has(key(path)),
    reads: path => readCounts.get(key(path)) ?? 0,
    files: () => [...files.keys()].sort(),
  }
}
