import type { AssetId, RefChangeSink } from '@stowage/schema'

interface RefSlot {
  id: AssetId
  incarnation: number
  count: number
}

export interface AssetRefCounter extends RefChangeSink {
  /** 以新的 incarnation 登记 id，计数清零 */
  track: (id: AssetId, incarnation: number) => void
  count: (id: AssetId) => number
  incarnationOf: (id: AssetId) => number | undefined
  /** 取出计数归零的 id，处理前会再次确认计数仍为 0 */
  drainZeroed: () => AssetId[]
  /** 放回删除队列，下次 drain 再处理 */
  requeue: (id: AssetId) => void
  forget: (id: AssetId) => void
}

export function createRefCounter(): AssetRefCounter {
  const slots = new Map<string, RefSlot>()
  const zeroed = new Set<string>()

  const resolveSlot = (id: AssetId, incarnation: number): RefSlot | undefined => {
    const slot = slots.get(id.uuid)
    if (!slot || slot.incarnation !== incarnation) {
      return undefined
    }
    return slot
  }

  return {
    track: (id, incarnation) => {
      slots.set(id.uuid, { id, incarnation, count: 0 })
      zeroed.delete(id.uuid)
    },
    increment: (id, incarnation) => {
      const slot = resolveSlot(id, incarnation)
      if (!slot) {
        return
      }
      slot.count++
      zeroed.delete(id.uuid)
    },
    decrement: (id, incarnation) => {
      const slot = resolveSlot(id, incarnation)
      if (!slot || slot.count === 0) {
        return
      }
      slot.count--
      if (slot.count === 0) {
        zeroed.add(id.uuid)
      }
    },
    count: id => slots.get(id.uuid)?.count ?? 0,
    incarnationOf: id => slots.get(id.uuid)?.incarnation,
    drainZeroed: () => {
      const ids: AssetId[] = []
      for (const uuid of zeroed) {
        const slot = slots.get(uuid)
        if (slot && slot.count === 0) {
          ids.push(slot.id)
        }
      }
      zeroed.clear()
      return ids
    },
    requeue: (id) => {
      if (slots.has(id.uuid)) {
        zeroed.add(id.uuid)
      }
    },
    forget: (id) => {
      slots.delete(id.uuid)
      zeroed.delete(id.uuid)
    },
  }
}
