export default {
  debug: true,
  dependencies: {
    policy: 'best-effort',
  },
}
