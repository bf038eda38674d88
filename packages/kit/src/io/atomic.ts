import { Buffer } from 'node:buffer'
import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import process from 'node:process'
import { dirname } from 'pathe'

/**
 * 先写临时文件再 rename，写入中途失败不会破坏已有文件
 */
export async function writeAtomic(absPath: string, content: Uint8Array | string): Promise<void> {
  const tmpPath = `${absPath}.tmp-${process.pid}-${Math.random().toString(16).slice(2)}`
  await mkdir(dirname(absPath), { recursive: true })

  try {
    if (typeof content === 'string') {
      await writeFile(tmpPath, content, 'utf8')
    }
    else {
      await writeFile(tmpPath, Buffer.from(content))
    }
    await rename(tmpPath, absPath)
  }
  catch (error) {
    await rm(tmpPath, { force: true })
    throw error
  }
}
