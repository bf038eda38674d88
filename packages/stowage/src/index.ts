import type { StowageConfig } from '@stowage/schema'

export { loadStowage, type LoadStowageOptions } from './core'
export { createAssetServer, type CreateAssetServerOptions } from './core/server'

export function defineStowageConfig(config: StowageConfig): StowageConfig {
  return config
}
