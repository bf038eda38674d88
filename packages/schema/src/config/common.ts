import { resolve } from 'node:path'
import process from 'node:process'
import { defineResolvers } from '../utils/def'

export default defineResolvers({
  extends: undefined,
  rootDir: {
    $resolve: (val: unknown) => typeof val === 'string' ? resolve(val) : process.cwd(),
  },
  debug: false,
})
