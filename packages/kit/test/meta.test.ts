import type { AssetSourceMeta, MetaStorage } from '@stowage/schema'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createFileMetaStorage, createMemoryMetaStorage, fingerprintBytes, MetaPersistError, parseAssetPath } from '../src'
import { createMetadataStore, importedArtifactHash, metaFilePath, parseSourceMeta } from '../src/internal'

const encoder = new TextEncoder()

function sampleMeta(source: string, fingerprint = 'f0'): AssetSourceMeta {
  return {
    version: 1,
    source,
    fingerprint,
    loader: 'text',
    produced: [{ id: 'id-1', label: null, type: 'text', dependencies: ['b.txt'] }],
    derived: [],
  }
}

describe('fingerprint', () => {
  it('sha256 of the bytes', () => {
    expect(fingerprintBytes(encoder.encode('hello'))).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824')
  })

  it('产物哈希由路径、类型与序列化器决定', () => {
    const path = parseAssetPath('a.txt')
    const hash = importedArtifactHash(path, 'text', 'text@1')
    expect(hash).toMatch(/^[0-9a-f]{32}$/)
    expect(importedArtifactHash(parseAssetPath('a.txt'), 'text', 'text@1')).toBe(hash)
    expect(importedArtifactHash(path, 'text', 'text@2')).not.toBe(hash)
  })
})

describe('meta records', () => {
  it('parseSourceMeta 校验结构', () => {
    const meta = sampleMeta('a.txt')
    expect(parseSourceMeta(JSON.parse(JSON.stringify(meta)))).toEqual(meta)
    expect(parseSourceMeta({ ...meta, version: 2 })).toBeUndefined()
    expect(parseSourceMeta({ ...meta, produced: [{ id: 1 }] })).toBeUndefined()
    expect(parseSourceMeta('nope')).toBeUndefined()
  })

  it('metaFilePath mirrors the source layout', () => {
    expect(metaFilePath('/meta', 'local://a/b.png')).toBe('/meta/local/a/b.png.meta')
    expect(metaFilePath('/meta', 'a.png')).toBe('/meta/default/a.png.meta')
  })
})

describe('file meta storage', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stowage-meta-'))
  })
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should write and read records', async () => {
    const storage = createFileMetaStorage(dir)
    const meta = sampleMeta('models/a.txt')
    await storage.write('models/a.txt', meta)

    expect(await storage.read('models/a.txt')).toEqual(meta)
    const raw = await readFile(join(dir, 'default', 'models', 'a.txt.meta'), 'utf8')
    expect(JSON.parse(raw)).toEqual(meta)

    await storage.remove('models/a.txt')
    expect(await storage.read('models/a.txt')).toBeUndefined()
  })

  it('损坏或缺失的记录视为不存在', async () => {
    const storage = createFileMetaStorage(dir)
    expect(await storage.read('missing.txt')).toBeUndefined()

    await mkdir(join(dir, 'default'), { recursive: true })
    await writeFile(join(dir, 'default', 'broken.txt.meta'), '{ not json')
    expect(await storage.read('broken.txt')).toBeUndefined()
  })
})

describe('metadata store', () => {
  it('指纹未变时跳过导入', async () => {
    const storage = createMemoryMetaStorage()
    const store = createMetadataStore({ storage })
    const path = parseAssetPath('a.txt')
    const bytes = encoder.encode('hello')
    let runs = 0
    const run = async (): Promise<{ loader: string, produced: [], result: number }> => {
      runs++
      return { loader: 'text', produced: [], result: runs }
    }

    const first = await store.getOrImport({ path, bytes, run })
    expect(first).toMatchObject({ status: 'imported', result: 1 })
    expect(first.meta.fingerprint).toBe(fingerprintBytes(bytes))
    expect(storage.entries().get('a.txt')?.loader).toBe('text')

    const second = await store.getOrImport({ path, bytes, run })
    expect(second.status).toBe('cached')
    expect(runs).toBe(1)

    await store.getOrImport({ path, bytes, force: true, run })
    await store.getOrImport({ path, bytes: encoder.encode('changed'), run })
    expect(runs).toBe(3)
  })

  it('should read persisted records on first access', async () => {
    const storage = createMemoryMetaStorage({ 'a.txt': sampleMeta('a.txt', fingerprintBytes(encoder.encode('x'))) })
    const store = createMetadataStore({ storage })
    const path = parseAssetPath('a.txt')
    expect(store.peek(path)).toBeUndefined()

    const result = await store.getOrImport({
      path,
      bytes: encoder.encode('x'),
      run: async () => ({ loader: 'text', produced: [], result: null }),
    })
    expect(result.status).toBe('cached')
    expect(store.peek(path)?.source).toBe('a.txt')

    store.forget(path)
    expect(store.peek(path)).toBeUndefined()
  })

  it('导入失败时不写入记录', async () => {
    const storage = createMemoryMetaStorage()
    const store = createMetadataStore({ storage })
    await expect(store.getOrImport({
      path: parseAssetPath('a.txt'),
      bytes: encoder.encode('x'),
      run: async () => {
        throw new Error('parse failed')
      },
    })).rejects.toThrowError('parse failed')
    expect(storage.entries().size).toBe(0)
  })

  it('deferSave 时由调用方保存记录', async () => {
    const storage = createMemoryMetaStorage()
    const store = createMetadataStore({ storage })
    const path = parseAssetPath('a.txt')
    const result = await store.getOrImport({
      path,
      bytes: encoder.encode('x'),
      deferSave: true,
      run: async () => ({ loader: 'text', produced: [], result: null }),
    })
    expect(result.status).toBe('imported')
    expect(store.peek(path)).toBeUndefined()
    expect(storage.entries().size).toBe(0)

    await store.save(path, result.meta)
    expect(store.peek(path)?.fingerprint).toBe(fingerprintBytes(encoder.encode('x')))
    expect(storage.entries().get('a.txt')?.loader).toBe('text')
  })

  it('落盘失败时保留内存记录并通知', async () => {
    const errors: Array<[string, MetaPersistError]> = []
    const storage: MetaStorage = {
      read: async () => undefined,
      write: async () => {
        throw new Error('disk full')
      },
      remove: async () => {},
    }
    const store = createMetadataStore({
      storage,
      onError: (key, error) => {
        errors.push([key, error])
      },
    })
    const path = parseAssetPath('local://a.txt')
    const result = await store.getOrImport({
      path,
      bytes: encoder.encode('x'),
      run: async () => ({ loader: 'text', produced: [], result: 1 }),
    })

    expect(result.status).toBe('imported')
    expect(store.peek(path)?.loader).toBe('text')
    expect(errors).toHaveLength(1)
    expect(errors[0][0]).toBe('local://a.txt')
    expect(errors[0][1].kind).toBe('meta-persist')
    expect(errors[0][1].message).toBe('Failed to persist metadata "local://a.txt": disk full')
  })

  it('persist 关闭时不访问后端', async () => {
    const storage = createMemoryMetaStorage()
    const store = createMetadataStore({ storage, persist: false })
    await store.getOrImport({
      path: parseAssetPath('a.txt'),
      bytes: encoder.encode('x'),
      run: async () => ({ loader: 'text', produced: [], result: 1 }),
    })
    expect(storage.entries().size).toBe(0)
    expect(store.peek(parseAssetPath('a.txt'))?.loader).toBe('text')
  })
})
