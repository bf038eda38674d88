import type { AssetSourceMeta, DerivedArtifactMeta, MetaStorage, ProducedAssetMeta } from '@stowage/schema'
import { readFile, rm } from 'node:fs/promises'
import { join } from 'pathe'
import { parseAssetPath } from '../asset/path'
import { writeAtomic } from '../io/atomic'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

function parseProduced(value: unknown): ProducedAssetMeta | undefined {
  if (!isRecord(value)) {
    return undefined
  }
  const { id, label, type, dependencies } = value
  if (typeof id !== 'string' || typeof type !== 'string' || !isStringArray(dependencies)) {
    return undefined
  }
  if (label !== null && typeof label !== 'string') {
    return undefined
  }
  return { id, label, type, dependencies }
}

function parseDerived(value: unknown): DerivedArtifactMeta | undefined {
  if (!isRecord(value)) {
    return undefined
  }
  const { id, path, serializer, sourceFingerprint } = value
  if (typeof id !== 'string' || typeof path !== 'string' || typeof serializer !== 'string' || typeof sourceFingerprint !== 'string') {
    return undefined
  }
  return { id, path, serializer, sourceFingerprint }
}

/**
 * 校验 .meta 内容，版本或结构不符时视为不存在
 */
export function parseSourceMeta(value: unknown): AssetSourceMeta | undefined {
  if (!isRecord(value) || value.version !== 1) {
    return undefined
  }
  const { source, fingerprint, loader, produced, derived } = value
  if (typeof source !== 'string' || typeof fingerprint !== 'string' || typeof loader !== 'string') {
    return undefined
  }
  if (!Array.isArray(produced) || !Array.isArray(derived)) {
    return undefined
  }

  const producedList: ProducedAssetMeta[] = []
  for (const item of produced) {
    const parsed = parseProduced(item)
    if (!parsed) {
      return undefined
    }
    producedList.push(parsed)
  }

  const derivedList: DerivedArtifactMeta[] = []
  for (const item of derived) {
    const parsed = parseDerived(item)
    if (!parsed) {
      return undefined
    }
    derivedList.push(parsed)
  }

  return { version: 1, source, fingerprint, loader, produced: producedList, derived: derivedList }
}

/** `<dir>/<source>/<path>.meta` */
export function metaFilePath(dir: string, key: string): string {
  const path = parseAssetPath(key)
  return join(dir, path.source, `${path.path}.meta`)
}

export function createFileMetaStorage(dir: string): MetaStorage {
  return {
    read: async (key) => {
      let content: string
      try {
        content = await readFile(metaFilePath(dir, key), 'utf8')
      }
      catch {
        return undefined
      }
      try {
        const parsed: unknown = JSON.parse(content)
        return parseSourceMeta(parsed)
      }
      catch {
        // 损坏的记录等同于没有记录，下次导入会覆盖
        return undefined
      }
    },
    write: async (key, meta) => {
      await writeAtomic(metaFilePath(dir, key), `${JSON.stringify(meta, null, 2)}\n`)
    },
    remove: async (key) => {
      await rm(metaFilePath(dir, key), { force: true })
    },
  }
}

export function createMemoryMetaStorage(initial: Record<string, AssetSourceMeta> = {}): MetaStorage & { entries: () => Map<string, AssetSourceMeta> } {
  const records = new Map(Object.entries(initial))
  return {
    read: async key => records.get(key),
    write: async (key, meta) => {
      records.set(key, structuredClone(meta))
    },
    remove: async (key) => {
      records.delete(key)
    },
    entries: () => records,
  }
}
