import type { AssetErrorKind, AssetLoadError } from '@stowage/schema'

/** 资产系统错误基类 */
export class AssetError extends Error implements AssetLoadError {
  readonly kind: AssetErrorKind

  constructor(kind: AssetErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.name = 'AssetError'
  }
}

export type AssetIoErrorCode = 'not-found' | 'unreadable' | 'unsupported'

/** 数据源不可读 / 不可写 */
export class AssetIoError extends AssetError {
  constructor(
    public readonly path: string,
    public readonly code: AssetIoErrorCode,
    options?: { cause?: unknown },
  ) {
    super('io', `Failed to access source "${path}": ${code}`, options)
    this.name = 'AssetIoError'
  }
}

export class LoaderNotFoundError extends AssetError {
  constructor(public readonly path: string) {
    super('loader-not-found', `No loader registered for "${path}"`)
    this.name = 'LoaderNotFoundError'
  }
}

/** 字节与匹配到的加载器不符 */
export class DeserializeError extends AssetError {
  constructor(
    public readonly path: string,
    public readonly loader: string,
    options?: { cause?: unknown },
  ) {
    super('deserialize', `Loader "${loader}" failed to parse "${path}"${describeCause(options?.cause)}`, options)
    this.name = 'DeserializeError'
  }
}

export class DependencyFailedError extends AssetError {
  constructor(
    public readonly path: string,
    public readonly dependencies: string[],
  ) {
    super('dependency-failed', `Required dependencies of "${path}" failed: ${dependencies.join(', ')}`)
    this.name = 'DependencyFailedError'
  }
}

export class CyclicDependencyError extends AssetError {
  constructor(public readonly cycle: string[]) {
    super('cyclic-dependency', `Cyclic dependency detected: ${cycle.join(' -> ')}`)
    this.name = 'CyclicDependencyError'
  }
}

export class DuplicateAssetIdError extends AssetError {
  constructor(
    public readonly id: string,
    public readonly owner: string,
  ) {
    super('duplicate-asset-id', `Asset id ${id} is already owned by ${owner}`)
    this.name = 'DuplicateAssetIdError'
  }
}

export class AssetLoadCancelledError extends AssetError {
  constructor(public readonly path: string) {
    super('cancelled', `Load of "${path}" was cancelled`)
    this.name = 'AssetLoadCancelledError'
  }
}

export class AssetTypeMismatchError extends AssetError {
  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super('type-mismatch', `Asset "${path}" is of type "${actual}", expected "${expected}"`)
    this.name = 'AssetTypeMismatchError'
  }
}

export class MissingLabelError extends AssetError {
  constructor(public readonly path: string) {
    super('missing-label', `Loader did not produce labeled asset "${path}"`)
    this.name = 'MissingLabelError'
  }
}

export class SerializerNotFoundError extends AssetError {
  constructor(public readonly type: string) {
    super('serializer-not-found', `No serializer registered for asset type "${type}"`)
    this.name = 'SerializerNotFoundError'
  }
}

export class AssetTypeNotRegisteredError extends AssetError {
  constructor(public readonly type: string) {
    super('type-not-registered', `Asset type "${type}" is not registered`)
    this.name = 'AssetTypeNotRegisteredError'
  }
}

export class MetaPersistError extends AssetError {
  constructor(
    public readonly key: string,
    options?: { cause?: unknown },
  ) {
    super('meta-persist', `Failed to persist metadata "${key}"${describeCause(options?.cause)}`, options)
    this.name = 'MetaPersistError'
  }
}

export function isAssetError(error: unknown): error is AssetError {
  return error instanceof AssetError
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return `: ${cause.message}`
  }
  return ''
}
