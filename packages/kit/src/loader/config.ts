import type { DependencyPolicy, StowageConfig, StowageOptions } from '@stowage/schema'
import process from 'node:process'
import { StowageConfigSchema } from '@stowage/schema'
import { loadConfig } from 'c12'
import { defu } from 'defu'
import { resolve } from 'pathe'
import { applyDefaults } from 'untyped'

export interface LoadConfigOptions {
  cwd?: string
  mode?: string
  /** 优先级最高的配置 */
  overrides?: StowageConfig
}

export async function loadStowageConfig(options: LoadConfigOptions = {}): Promise<StowageOptions> {
  const root = resolve(options.cwd || process.cwd())

  // 1. 加载默认配置 stowage.config
  const { configFile, config: baseConfig } = await loadConfig<StowageConfig>({
    cwd: root,
    name: 'stowage',
    configFile: 'stowage.config',
    rcFile: false,
    globalRc: false,
    dotenv: true,
    extend: { extendKey: ['extends'] },
  })

  // 2. 指定 mode 时加载 stowage.config.<mode>
  let modeConfig: StowageConfig = {}
  if (options.mode) {
    const { config } = await loadConfig<StowageConfig>({
      cwd: root,
      name: 'stowage',
      configFile: `stowage.config.${options.mode}`,
      rcFile: false,
      globalRc: false,
      dotenv: false,
      extend: { extendKey: ['extends'] },
    })
    modeConfig = config || {}
  }

  // 3. 合并配置 overrides > mode > base
  const overrides: StowageConfig = options.overrides ?? {}
  const merged: StowageConfig = defu(overrides, modeConfig, baseConfig ?? {})
  merged.rootDir ??= root

  // 4. 附加默认值
  const resolved = await applyDefaults(StowageConfigSchema, { ...merged })

  return normalizeOptions(resolved, {
    configFile,
    mode: options.mode,
    sources: merged.sources,
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value ? value : fallback
}

function readBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback
}

function readNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback
}

function readPolicy(value: unknown): DependencyPolicy {
  return value === 'best-effort' ? 'best-effort' : 'fail-fast'
}

function readSources(...candidates: unknown[]): Record<string, string> {
  const sources: Record<string, string> = {}
  for (const candidate of candidates) {
    if (!isRecord(candidate)) {
      continue
    }
    for (const [name, dir] of Object.entries(candidate)) {
      if (typeof dir === 'string' && !(name in sources)) {
        sources[name] = dir
      }
    }
  }
  return sources
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {}
}

interface NormalizeExtras {
  configFile?: string
  mode?: string
  sources?: Record<string, string>
}

/**
 * 把 untyped 的结果收窄为 StowageOptions
 */
export function normalizeOptions(resolved: Record<string, unknown>, extras: NormalizeExtras = {}): StowageOptions {
  const meta = section(resolved.meta)
  const imports = section(resolved.import)
  const watch = section(resolved.watch)
  const dependencies = section(resolved.dependencies)

  return {
    rootDir: readString(resolved.rootDir, process.cwd()),
    debug: readBoolean(resolved.debug, false),
    assetsDir: readString(resolved.assetsDir, 'assets'),
    sources: readSources(resolved.sources, extras.sources),
    meta: {
      dir: readString(meta.dir, '.stowage/meta'),
      persist: readBoolean(meta.persist, true),
    },
    import: {
      enabled: readBoolean(imports.enabled, false),
      dir: readString(imports.dir, '.stowage/imported'),
    },
    watch: {
      enabled: readBoolean(watch.enabled, false),
      debounceMs: readNumber(watch.debounceMs, 50),
    },
    dependencies: {
      policy: readPolicy(dependencies.policy),
    },
    ...(extras.configFile ? { __configFile: extras.configFile } : {}),
    ...(extras.mode ? { __mode: extras.mode } : {}),
  }
}
