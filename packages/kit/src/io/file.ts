import type { SourceChangeListener, SourceIO } from '@stowage/schema'
import type { FSWatcher } from 'chokidar'
import { readFile } from 'node:fs/promises'
import { normalizeSlashes, trimSlashes } from '@stowage/utils'
import { watch } from 'chokidar'
import fg from 'fast-glob'
import { join, relative, resolve } from 'pathe'
import { AssetIoError } from '../errors'
import { useLogger } from '../logger'
import { writeAtomic } from './atomic'

export interface FileSourceOptions {
  /** 数据源根目录 */
  root: string
  /** 为 false 时 write 抛出 unsupported */
  writable?: boolean
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

/**
 * 基于本地目录的数据源
 */
export function createFileSource(options: FileSourceOptions): SourceIO {
  const root = resolve(options.root)
  const listeners = new Map<string, Set<SourceChangeListener>>()
  const logger = useLogger('stowage:fs')
  let watcher: FSWatcher | undefined

  const toAbsolute = (path: string): string => {
    const absolute = resolve(root, normalizeSlashes(path))
    const rel = relative(root, absolute)
    if (!rel || rel.startsWith('..')) {
      throw new AssetIoError(path, 'unsupported')
    }
    return absolute
  }

  const ensureWatcher = (): FSWatcher => {
    if (watcher) {
      return watcher
    }
    const instance = watch(root, {
      ignoreInitial: true,
      ignorePermissionErrors: true,
    })
    instance.on('all', (event, filePath) => {
      if (event !== 'add' && event !== 'change' && event !== 'unlink') {
        return
      }
      const rel = relative(root, normalizeSlashes(filePath))
      const subscribed = listeners.get(rel)
      if (!subscribed) {
        return
      }
      logger.debug(`[${event}] ${rel}`)
      for (const listener of subscribed) {
        listener({ kind: event, path: rel })
      }
    })
    instance.on('error', (error) => {
      logger.warn(`Watcher error in ${root}:`, error)
    })
    watcher = instance
    return instance
  }

  const closeWatcher = async (): Promise<void> => {
    const current = watcher
    watcher = undefined
    await current?.close()
  }

  return {
    read: async (path, readOptions = {}) => {
      try {
        const buffer = await readFile(toAbsolute(path), { signal: readOptions.signal })
        return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
      }
      catch (error) {
        if (error instanceof AssetIoError || isAbortError(error)) {
          throw error
        }
        const code = errorCode(error)
        throw new AssetIoError(path, code === 'ENOENT' ? 'not-found' : 'unreadable', { cause: error })
      }
    },
    write: async (path, bytes) => {
      if (options.writable === false) {
        throw new AssetIoError(path, 'unsupported')
      }
      try {
        await writeAtomic(toAbsolute(path), bytes)
      }
      catch (error) {
        if (error instanceof AssetIoError) {
          throw error
        }
        throw new AssetIoError(path, 'unreadable', { cause: error })
      }
    },
    readDirectory: async (dir) => {
      const base = trimSlashes(dir)
      const cwd = base ? toAbsolute(base) : root
      const files = await fg('**/*', { cwd, onlyFiles: true, dot: false })
      return files.map(file => base ? join(base, file) : file).sort()
    },
    watch: (path, listener) => {
      const rel = relative(root, toAbsolute(path))
      const set = listeners.get(rel) ?? new Set()
      set.add(listener)
      listeners.set(rel, set)
      ensureWatcher()

      return async () => {
        set.delete(listener)
        if (!set.size) {
          listeners.delete(rel)
        }
        if (!listeners.size) {
          await closeWatcher()
        }
      }
    },
    close: async () => {
      listeners.clear()
      await closeWatcher()
    },
  }
}
