import type { AssetId, AssetRef, AssetStore, AssetStoreEntry, AssetType } from '@stowage/schema'
import type { AssetRefCounter } from '../handle/ref-counter'
import { DuplicateAssetIdError } from '../errors'
import { idOf, isHandleLike } from '../handle/handle'

export interface AssetEntry<T> {
  readonly id: AssetId<T>
  value: T
  generation: number
  incarnation: number
  degraded: boolean
}

export interface InsertOptions {
  incarnation: number
  degraded?: boolean
}

export type InsertOutcome = 'added' | 'modified'

/**
 * 类型化资产表：AssetId -> 值 / 版本 / 引用计数
 */
export class Assets<T = unknown> implements AssetStore<T> {
  readonly type: AssetType<T>
  private readonly entries = new Map<string, AssetEntry<T>>()
  private readonly touched = new Set<string>()
  private readonly refs: AssetRefCounter

  constructor(type: AssetType<T>, refs: AssetRefCounter) {
    this.type = type
    this.refs = refs
  }

  get size(): number {
    return this.entries.size
  }

  has(ref: AssetRef<T>): boolean {
    return this.lookup(ref) !== undefined
  }

  /** 句柄的 incarnation 不匹配时返回 undefined，不会读到复用 id 的新资产 */
  get(ref: AssetRef<T>): T | undefined {
    return this.lookup(ref)?.value
  }

  getEntry(ref: AssetRef<T>): AssetStoreEntry<T> | undefined {
    return this.lookup(ref)
  }

  /**
   * 取出可原地修改的值，generation +1，下次 update 时发出 modified
   */
  getMut(ref: AssetRef<T>): T | undefined {
    const entry = this.lookup(ref)
    if (!entry) {
      return undefined
    }
    entry.generation++
    this.touched.add(entry.id.uuid)
    return entry.value
  }

  insert(id: AssetId<T>, value: T, options: InsertOptions): InsertOutcome {
    const existing = this.entries.get(id.uuid)
    if (existing) {
      if (existing.incarnation !== options.incarnation) {
        throw new DuplicateAssetIdError(id.uuid, `${this.type.name}#${existing.incarnation}`)
      }
      existing.value = value
      existing.generation++
      existing.degraded = options.degraded ?? false
      return 'modified'
    }

    this.entries.set(id.uuid, {
      id,
      value,
      generation: 0,
      incarnation: options.incarnation,
      degraded: options.degraded ?? false,
    })
    return 'added'
  }

  ids(): AssetId<T>[] {
    return [...this.entries.values()].map(entry => entry.id)
  }

  * [Symbol.iterator](): IterableIterator<[AssetId<T>, T]> {
    for (const entry of this.entries.values()) {
      yield [entry.id, entry.value]
    }
  }

  refCount(ref: AssetRef<T>): number {
    return this.refs.count(idOf(ref))
  }

  /**
   * 仅由删除队列处理器调用；句柄 drop 不会直接删除
   * @internal
   */
  remove(id: AssetId<T>): AssetEntry<T> | undefined {
    const entry = this.entries.get(id.uuid)
    if (!entry) {
      return undefined
    }
    this.entries.delete(id.uuid)
    this.touched.delete(id.uuid)
    return entry
  }

  /** @internal */
  drainTouched(): AssetEntry<T>[] {
    const touched: AssetEntry<T>[] = []
    for (const uuid of this.touched) {
      const entry = this.entries.get(uuid)
      if (entry) {
        touched.push(entry)
      }
    }
    this.touched.clear()
    return touched
  }

  private lookup(ref: AssetRef<T>): AssetEntry<T> | undefined {
    const entry = this.entries.get(idOf(ref).uuid)
    if (!entry) {
      return undefined
    }
    if (isHandleLike(ref) && ref.incarnation !== entry.incarnation) {
      return undefined
    }
    return entry
  }
}

/** 通过类型描述对象的同一性收窄存储类型 */
export function isStoreOf<T>(store: Assets<unknown>, type: AssetType<T>): store is Assets<T> {
  return store.type === type
}
