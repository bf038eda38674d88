/**
 * 定义配置默认值与 $resolve 解析器，供 untyped 的 applyDefaults 使用
 */
export function defineResolvers<C extends Record<string, unknown>>(config: C): C {
  return config
}
