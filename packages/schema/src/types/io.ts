import type { AssetSourceMeta } from './meta'

export type SourceChangeKind = 'add' | 'change' | 'unlink'

export interface SourceChangeEvent {
  kind: SourceChangeKind
  /** 数据源内的相对路径 */
  path: string
}

export type SourceChangeListener = (event: SourceChangeEvent) => void

export type Unwatch = () => Promise<void>

export interface SourceReadOptions {
  signal?: AbortSignal
}

/**
 * 原始字节读写能力
 */
export interface SourceIO {
  /** 读取原始字节，失败时抛出 AssetIoError */
  read: (path: string, options?: SourceReadOptions) => Promise<Uint8Array>
  /** 写入原始字节 */
  write?: (path: string, bytes: Uint8Array) => Promise<void>
  /** 列出目录下的文件（相对数据源根目录） */
  readDirectory?: (dir: string) => Promise<string[]>
  /** 监听路径变化 */
  watch?: (path: string, listener: SourceChangeListener) => Unwatch
  /** 释放资源 */
  close?: () => Promise<void>
}

/**
 * 元数据持久化后端
 */
export interface MetaStorage {
  read: (key: string) => Promise<AssetSourceMeta | undefined>
  /** 需要原子替换：写入失败不能破坏已有记录 */
  write: (key: string, meta: AssetSourceMeta) => Promise<void>
  remove: (key: string) => Promise<void>
}
