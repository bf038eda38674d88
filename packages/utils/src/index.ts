export { createDeferred, debounce, type Deferred } from './functions'
export { normalizeSlashes, trimSlashes } from './strings'
