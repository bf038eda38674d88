import type { AssetPath } from '@stowage/schema'
import { createHash } from 'node:crypto'
import { formatAssetPath } from '../asset/path'

/** 源字节的内容指纹 */
export function fingerprintBytes(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex')
}

/**
 * 派生产物文件名使用的哈希：路径 + 类型 + 序列化器
 * 同一源在同一序列化器下总是写到同一位置
 */
export function importedArtifactHash(path: AssetPath, typeName: string, serializerTag: string): string {
  return createHash('sha256')
    .update(formatAssetPath(path))
    .update('\0')
    .update(typeName)
    .update('\0')
    .update(serializerTag)
    .digest('hex')
    .slice(0, 32)
}
