import type {
  AssetHandle,
  AssetPath,
  AssetPathInput,
  AssetType,
  DependencyInput,
  DependencyOptions,
  LoadContext,
} from '@stowage/schema'
import { resolveAssetPath, withLabel } from '@stowage/kit'

export interface CollectedDependency {
  path: AssetPath
  required: boolean
}

export interface CollectedLabeledAsset {
  label: string
  type: AssetType
  value: unknown
  dependencies: CollectedDependency[]
}

/**
 * 加载上下文依赖的 server 能力
 */
export interface LoadContextHost {
  path: AssetPath
  signal: AbortSignal
  load: <U>(type: AssetType<U>, path: AssetPath) => AssetHandle<U>
  loadUntyped: (path: AssetPath) => AssetHandle<unknown>
  /** 为子资产分配 id 并返回 weak 句柄 */
  labelHandle: <U>(path: AssetPath, type: AssetType<U>) => AssetHandle<U>
  read: (path: AssetPath, signal: AbortSignal) => Promise<Uint8Array>
}

export interface LoadContextCollector {
  context: LoadContext
  /** 源资产自身的依赖 */
  dependencies: CollectedDependency[]
  labeled: Map<string, CollectedLabeledAsset>
}

export function resolveDependencyInput(base: AssetPath, input: DependencyInput): CollectedDependency {
  if (typeof input === 'string' || 'source' in input) {
    return { path: resolveAssetPath(base, input), required: true }
  }
  return { path: resolveAssetPath(base, input.path), required: input.required ?? true }
}

export function createLoadContext(host: LoadContextHost): LoadContextCollector {
  const dependencies: CollectedDependency[] = []
  const labeled = new Map<string, CollectedLabeledAsset>()

  const record = (input: AssetPathInput, options: DependencyOptions = {}): AssetPath => {
    const path = resolveAssetPath(host.path, input)
    dependencies.push({ path, required: options.required ?? true })
    return path
  }

  const context: LoadContext = {
    path: host.path,
    signal: host.signal,
    load: (type, input, options) => host.load(type, record(input, options)),
    loadUntyped: (input, options) => host.loadUntyped(record(input, options)),
    addDependency: (input, options) => {
      record(input, options)
    },
    addLabeledAsset: (label, type, value, options = {}) => {
      if (!label) {
        throw new Error(`Labeled asset of "${host.path.path}" needs a non-empty label`)
      }
      const path = withLabel(host.path, label)
      labeled.set(label, {
        label,
        type,
        value,
        dependencies: (options.dependencies ?? []).map(input => resolveDependencyInput(path, input)),
      })
      return host.labelHandle(path, type)
    },
    hasLabeledAsset: label => labeled.has(label),
    readBytes: input => host.read(resolveAssetPath(host.path, input), host.signal),
  }

  return { context, dependencies, labeled }
}
