import type { AssetHandle, AssetId, AssetRef, HandleKind, HandleLike, RefChangeSink } from '@stowage/schema'
import { typedAssetId } from '../asset/id'

/**
 * 资产句柄
 * strong 句柄创建时计数 +1，drop 时 -1；weak 句柄不参与计数
 */
export class Handle<T = unknown> implements AssetHandle<T> {
  readonly id: AssetId<T>
  readonly kind: HandleKind
  readonly incarnation: number
  private dropped = false
  private readonly sink: RefChangeSink | null

  private constructor(id: AssetId<T>, kind: HandleKind, incarnation: number, sink: RefChangeSink | null) {
    this.id = id
    this.kind = kind
    this.incarnation = incarnation
    this.sink = sink
  }

  static strong<T>(id: AssetId<T>, incarnation: number, sink: RefChangeSink): Handle<T> {
    sink.increment(id, incarnation)
    return new Handle(id, 'strong', incarnation, sink)
  }

  static weak<T>(id: AssetId<T>, incarnation: number): Handle<T> {
    return new Handle(id, 'weak', incarnation, null)
  }

  get isStrong(): boolean {
    return this.kind === 'strong'
  }

  get isDropped(): boolean {
    return this.dropped
  }

  clone(): Handle<T> {
    if (this.sink && !this.dropped) {
      return Handle.strong(this.id, this.incarnation, this.sink)
    }
    return Handle.weak(this.id, this.incarnation)
  }

  downgrade(): Handle<T> {
    return Handle.weak(this.id, this.incarnation)
  }

  drop(): void {
    if (!this.sink || this.dropped) {
      return
    }
    this.dropped = true
    this.sink.decrement(this.id, this.incarnation)
  }

  /** 不做类型检查的重新标注，类型校验见 AssetServer.typed */
  retype<U>(): Handle<U> {
    const id = typedAssetId<U>(this.id)
    if (this.sink && !this.dropped) {
      return Handle.strong(id, this.incarnation, this.sink)
    }
    return Handle.weak(id, this.incarnation)
  }

  toJSON(): { id: string, kind: HandleKind } {
    return { id: this.id.uuid, kind: this.kind }
  }
}

export function isHandleLike<T>(value: AssetId<T> | HandleLike<T>): value is HandleLike<T> {
  return 'incarnation' in value
}

export function idOf<T>(ref: AssetRef<T>): AssetId<T> {
  return isHandleLike(ref) ? ref.id : ref
}
