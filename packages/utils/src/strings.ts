export function normalizeSlashes(value: string): string {
  return value.replace(/\\/g, '/')
}

/** 去掉开头的 `./` 与 `/`，以及末尾的 `/` */
export function trimSlashes(value: string): string {
  return normalizeSlashes(value)
    .replace(/^(\.\/)+/, '')
    .replace(/^\/+|\/+$/g, '')
}
