export { default as StowageConfigSchema } from './config'

// 类型
export * from './types/asset'
export * from './types/config'
export * from './types/handle'
export * from './types/hooks'
export * from './types/io'
export * from './types/loader'
export * from './types/meta'
export * from './types/server'
