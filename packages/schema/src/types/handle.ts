import type { AssetId } from './asset'

/** strong 参与引用计数，weak 仅观察 */
export type HandleKind = 'strong' | 'weak'

/**
 * 引用计数变更接收方
 * incarnation 与当前不一致的变更会被忽略
 */
export interface RefChangeSink {
  increment: (id: AssetId, incarnation: number) => void
  decrement: (id: AssetId, incarnation: number) => void
}

export interface HandleLike<T = unknown> {
  readonly id: AssetId<T>
  readonly kind: HandleKind
  readonly incarnation: number
}

/**
 * 资产句柄：只持有 id，不直接引用值
 */
export interface AssetHandle<T = unknown> extends HandleLike<T> {
  readonly isStrong: boolean
  /** strong 句柄已释放 */
  readonly isDropped: boolean
  /** strong 句柄克隆时引用计数 +1 */
  clone: () => AssetHandle<T>
  downgrade: () => AssetHandle<T>
  /** 释放 strong 句柄，重复调用无效 */
  drop: () => void
}

/** 接受 id 或句柄的位置 */
export type AssetRef<T = unknown> = AssetId<T> | HandleLike<T>
