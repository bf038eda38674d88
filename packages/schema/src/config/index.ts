import common from './common'
import server from './server'

export default {
  ...common,
  ...server,
}
