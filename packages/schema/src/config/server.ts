import { defineResolvers } from '../utils/def'

export default defineResolvers({
  assetsDir: 'assets',
  sources: {},
  meta: {
    dir: '.stowage/meta',
    persist: true,
  },
  import: {
    enabled: false,
    dir: '.stowage/imported',
  },
  watch: {
    enabled: false,
    debounceMs: 50,
  },
  dependencies: {
    policy: {
      $resolve: (val: unknown) => val === 'best-effort' ? 'best-effort' : 'fail-fast',
    },
  },
})
