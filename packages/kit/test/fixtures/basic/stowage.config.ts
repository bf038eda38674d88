export default {
  assetsDir: 'content',
  sources: {
    shared: '../shared',
  },
  watch: {
    enabled: true,
  },
}
