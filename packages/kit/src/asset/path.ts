import type { AssetPath, AssetPathInput } from '@stowage/schema'
import { DEFAULT_SOURCE } from '@stowage/schema'
import { trimSlashes } from '@stowage/utils'
import { basename, dirname, join, normalize } from 'pathe'

const SOURCE_SEPARATOR = '://'

function normalizeRelative(path: string): string {
  return trimSlashes(normalize(trimSlashes(path)))
}

export function createAssetPath(path: string, options: { source?: string, label?: string } = {}): AssetPath {
  const label = options.label?.trim()
  return {
    source: options.source || DEFAULT_SOURCE,
    path: normalizeRelative(path),
    ...(label ? { label } : {}),
  }
}

/**
 * 解析 `source://dir/file.ext#label`，省略 source 时使用 default
 */
export function parseAssetPath(input: AssetPathInput): AssetPath {
  if (typeof input !== 'string') {
    return createAssetPath(input.path, { source: input.source, label: input.label })
  }

  let rest = input.trim()
  let source: string = DEFAULT_SOURCE
  const sourceIndex = rest.indexOf(SOURCE_SEPARATOR)
  if (sourceIndex > 0) {
    source = rest.slice(0, sourceIndex)
    rest = rest.slice(sourceIndex + SOURCE_SEPARATOR.length)
  }

  let label: string | undefined
  const labelIndex = rest.lastIndexOf('#')
  if (labelIndex >= 0) {
    label = rest.slice(labelIndex + 1)
    rest = rest.slice(0, labelIndex)
  }

  if (!rest) {
    throw new Error(`Invalid asset path: "${input}"`)
  }

  return createAssetPath(rest, { source, label })
}

export function formatAssetPath(path: AssetPath): string {
  const prefix = path.source === DEFAULT_SOURCE ? '' : `${path.source}${SOURCE_SEPARATOR}`
  const suffix = path.label ? `#${path.label}` : ''
  return `${prefix}${path.path}${suffix}`
}

/** 数据源维度的 key（不含标签），读取、解析与去重都以它为单位 */
export function sourceKeyOf(path: AssetPath): string {
  return formatAssetPath(withoutLabel(path))
}

export function isSameAssetPath(a: AssetPath, b: AssetPath): boolean {
  return a.source === b.source && a.path === b.path && (a.label ?? '') === (b.label ?? '')
}

export function withLabel(path: AssetPath, label: string | undefined): AssetPath {
  return createAssetPath(path.path, { source: path.source, label })
}

export function withoutLabel(path: AssetPath): AssetPath {
  return createAssetPath(path.path, { source: path.source })
}

/**
 * 以 `./` 或 `../` 开头的依赖相对当前文件所在目录解析，并继承数据源
 */
export function resolveAssetPath(base: AssetPath, input: AssetPathInput): AssetPath {
  if (typeof input === 'string' && /^\.\.?\//.test(input)) {
    const joined = join(dirname(base.path), input)
    const parsed = parseAssetPath(joined)
    return createAssetPath(parsed.path, { source: base.source, label: parsed.label })
  }
  return parseAssetPath(input)
}

/**
 * `a/b.scene.json` -> ['scene.json', 'json']，长扩展名优先
 */
export function getAssetPathExtensions(path: AssetPath): string[] {
  const name = basename(path.path)
  const parts = name.split('.').slice(1).filter(Boolean)
  if (name.startsWith('.')) {
    parts.shift()
  }
  const extensions: string[] = []
  for (let i = 0; i < parts.length; i++) {
    extensions.push(parts.slice(i).join('.').toLowerCase())
  }
  return extensions
}
