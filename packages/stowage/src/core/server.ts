import type {
  AddAssetOptions,
  AssetEvent,
  AssetHandle,
  AssetId,
  AssetLoadError,
  AssetLoader,
  AssetPath,
  AssetRef,
  AssetServer,
  AssetServerHooks,
  AssetSourceMeta,
  AssetType,
  DependencyPolicy,
  DerivedArtifactMeta,
  HandleLike,
  LoaderResult,
  LoadOptions,
  LoadState,
  MetaStorage,
  ProducedAssetMeta,
  SourceIO,
  StowageConfig,
  Unwatch,
} from '@stowage/schema'
import type { DependencyLink } from '@stowage/kit/internal'
import type { Deferred } from '@stowage/utils'
import type { CollectedDependency } from './load-context'
import { randomUUID } from 'node:crypto'
import {
  AssetError,
  assetIdFromPath,
  AssetIoError,
  AssetLoadCancelledError,
  AssetTypeMismatchError,
  AssetTypeNotRegisteredError,
  createAssetId,
  createAssetPath,
  createMemoryMetaStorage,
  DependencyFailedError,
  DeserializeError,
  DuplicateAssetIdError,
  formatAssetPath,
  Handle,
  idOf,
  isAssetError,
  isHandleLike,
  LoaderNotFoundError,
  MissingLabelError,
  parseAssetPath,
  SerializerNotFoundError,
  sourceKeyOf,
  typedAssetId,
  useLogger,
  withoutLabel,
} from '@stowage/kit'
import {
  Assets,
  createDependencyGraph,
  createDerivationRegistry,
  createLoaderRegistry,
  createMetadataStore,
  createRefCounter,
  createSerializerRegistry,
  importedArtifactHash,
  isStoreOf,
  normalizeOptions,
  runWithAssetServerContext,
} from '@stowage/kit/internal'
import { createDeferred, debounce } from '@stowage/utils'
import { createHooks } from 'hookable'
import { createLoadContext, resolveDependencyInput } from './load-context'

export interface CreateAssetServerOptions {
  /** 未指定的字段使用默认配置 */
  options?: StowageConfig
  /** 数据源：名称 -> SourceIO，default 为默认数据源 */
  sources?: Record<string, SourceIO>
  /** 派生产物写入目标 */
  importIO?: SourceIO
  /** 元数据后端，默认保存在内存 */
  metaStorage?: MetaStorage
}

interface AssetInfo {
  id: AssetId
  path: AssetPath | undefined
  sourceKey: string | undefined
  typeName: string | undefined
  state: LoadState
  incarnation: number
  waiters: Array<(state: LoadState) => void>
}

interface SourceGroup {
  path: AssetPath
  ids: Set<string>
  unwatch?: Unwatch
}

interface LoadOutcome {
  status: 'committed' | 'cached' | 'failed'
  ids: AssetId[]
}

interface InFlightLoad {
  key: string
  path: AssetPath
  reason: 'load' | 'reload'
  force: boolean
  policy: DependencyPolicy
  controller: AbortController
  /** 等待该次加载的 id */
  requested: Map<string, AssetId>
  /** 带类型的请求 */
  expected: Map<string, AssetType>
  /** 本次尝试中新分配的子资产 id */
  created: Map<string, AssetId>
  /** 本次尝试持有的依赖句柄，提交时转交给 retained */
  retained: Map<string, AssetHandle[]>
  /** 解析期间 context.load 产生的句柄 */
  parseHandles: AssetHandle[]
  previousLinks: Map<string, DependencyLink[]>
  reloadAfter: boolean
  done: Deferred<LoadOutcome>
}

interface ProducedAsset {
  id: AssetId
  label: string | null
  path: AssetPath
  type: AssetType
  value: unknown
  dependencies: CollectedDependency[]
}

interface ParsedSource {
  loader: string
  /** 子资产在前，源资产在最后 */
  assets: ProducedAsset[]
}

const TERMINAL_STATUSES = new Set<LoadState['status']>(['loaded', 'failed', 'unloaded'])

function isTerminal(state: LoadState): boolean {
  return TERMINAL_STATUSES.has(state.status)
}

let incarnationSeed = 0

/** 进程内唯一，id 每次重新进入表时分配 */
function nextIncarnation(): number {
  return ++incarnationSeed
}

export function createAssetServer(init: CreateAssetServerOptions = {}): AssetServer {
  const hooks = createHooks<AssetServerHooks>()
  const options = normalizeOptions({ ...init.options })

  const sources = new Map<string, SourceIO>(Object.entries(init.sources ?? {}))
  const importIO = init.importIO
  const refs = createRefCounter()
  const stores = new Map<string, Assets<unknown>>()
  const graph = createDependencyGraph()
  const loaders = createLoaderRegistry()
  const serializers = createSerializerRegistry()
  const derivations = createDerivationRegistry()

  const infos = new Map<string, AssetInfo>()
  const groups = new Map<string, SourceGroup>()
  const inflight = new Map<string, InFlightLoad>()
  const retained = new Map<string, AssetHandle[]>()
  // add / set 产生的事件在 update() 时发出
  const queuedEvents: AssetEvent[] = []
  let reloadChain: Promise<void> = Promise.resolve()
  let closed = false

  const server: AssetServer = {
    __name: `AssetServer-${randomUUID()}`,
    options,
    hooks,
    hook: hooks.hook.bind(hooks),
    callHook: hooks.callHook,
    runWithContext: fn => runWithAssetServerContext(server, fn),

    registerSource: (name, io) => {
      sources.set(name, io)
    },
    registerAssetType: type => ensureStore(type),
    assets: (type) => {
      const store = stores.get(type.name)
      if (!store) {
        throw new AssetTypeNotRegisteredError(type.name)
      }
      if (!isStoreOf(store, type)) {
        throw new AssetError('type-mismatch', `Asset type "${type.name}" is registered by another definition`)
      }
      return store
    },
    registerLoader: (loader) => {
      ensureStore(loader.type)
      loaders.register(loader)
    },
    registerSerializer: serializer => serializers.register(serializer),
    registerDerivation: derivation => derivations.register(derivation),

    load: (type, path, loadOptions) => request(parseAssetPath(path), type, loadOptions),
    loadUntyped: (path, loadOptions) => request(parseAssetPath(path), undefined, loadOptions),
    loadFolder: async (dir, folderOptions = {}) => {
      const base = dir ? parseAssetPath(dir) : createAssetPath('')
      const source = folderOptions.source ?? base.source
      const io = sources.get(source)
      if (!io?.readDirectory) {
        throw new AssetIoError(dir, 'unsupported')
      }
      const files = await io.readDirectory(base.path)
      const handles: AssetHandle<unknown>[] = []
      for (const file of files) {
        const path = createAssetPath(file, { source })
        if (!loaders.resolve(path)) {
          logger.debug(`Skipping "${formatAssetPath(path)}": no loader`)
          continue
        }
        handles.push(request(path, undefined, folderOptions))
      }
      return handles
    },
    whenSettled: ref => whenSettled(idOf(ref)),
    add: addAsset,
    set: (type, ref, value) => {
      const id = idOf(ref)
      const info = infos.get(id.uuid)
      if (!info || (isHandleLike(ref) && ref.incarnation !== info.incarnation)) {
        throw new Error(`Asset ${id.uuid} is not loaded`)
      }
      if (info.typeName && info.typeName !== type.name) {
        throw new AssetTypeMismatchError(id.uuid, type.name, info.typeName)
      }
      const store = ensureStore(type)
      const outcome = store.insert(id, value, { incarnation: info.incarnation })
      info.typeName = type.name
      info.state = { status: 'loaded', degraded: false }
      queuedEvents.push({
        type: outcome,
        id,
        assetType: type.name,
        path: info.path,
        generation: store.getEntry(id)?.generation ?? 0,
      })
    },
    typed: typedHandle,
    upgrade: upgradeHandle,

    getLoadState: ref => lookupInfo(ref)?.state ?? { status: 'unloaded' },
    getGroupLoadState: (list) => {
      const states = list.map(ref => lookupInfo(ref)?.state)
      if (states.some(state => state === undefined || state.status === 'unloaded')) {
        return 'unloaded'
      }
      if (states.some(state => state?.status === 'failed')) {
        return 'failed'
      }
      if (states.every(state => state?.status === 'loaded')) {
        return 'loaded'
      }
      return 'loading'
    },
    getHandlePath: ref => lookupInfo(ref)?.path,
    getTypeName: ref => lookupInfo(ref)?.typeName,
    getDependencies: (ref) => {
      const id = idOf(ref)
      return graph.dependenciesOf(id).map(link => ({ dependent: id, dependency: link.id, required: link.required }))
    },
    getDependents: ref => graph.dependentsOf(idOf(ref)),

    reload: path => queueReload(withoutLabel(parseAssetPath(path))),
    unload: path => unloadSource(withoutLabel(parseAssetPath(path))),
    save: async (type, input, value) => {
      const path = parseAssetPath(input)
      const serializer = serializers.get(type)
      if (!serializer) {
        throw new SerializerNotFoundError(type.name)
      }
      const io = sources.get(path.source)
      if (!io?.write) {
        throw new AssetIoError(formatAssetPath(path), 'unsupported')
      }
      const bytes = await serializer.serialize(value)
      await io.write(path.path, bytes)
      logger.debug(`Saved ${type.name} to "${formatAssetPath(path)}"`)
    },
    update: () => processUpdate(),

    close: async () => {
      if (closed) {
        return
      }
      closed = true
      const pending = [...inflight.values()]
      for (const entry of pending) {
        entry.controller.abort()
      }
      await Promise.all(pending.map(entry => entry.done.promise))
      await reloadChain

      for (const group of groups.values()) {
        const unwatch = group.unwatch
        group.unwatch = undefined
        await unwatch?.()
      }
      for (const io of sources.values()) {
        await io.close?.()
      }
      await callHookSafely(() => hooks.callHook('close'))
    },
  }

  // hook 在 server 上下文中执行
  const { callHook } = hooks
  hooks.callHook = (...args) => runWithAssetServerContext(server, () => callHook(...args))
  server.callHook = hooks.callHook

  const logger = runWithAssetServerContext(server, () => useLogger('stowage'))
  const meta = runWithAssetServerContext(server, () => createMetadataStore({
    storage: init.metaStorage ?? createMemoryMetaStorage(),
    persist: options.meta.persist,
    onError: (key, error) => callHookSafely(() => hooks.callHook('meta:error', key, error)),
  }))

  // ---------------------------------------------------------------- helpers

  function assertOpen(): void {
    if (closed) {
      throw new Error('AssetServer is closed')
    }
  }

  async function callHookSafely(run: () => Promise<unknown>): Promise<void> {
    try {
      await run()
    }
    catch (error) {
      logger.error('Hook subscriber failed:', error)
    }
  }

  function addAsset<T>(type: AssetType<T>, value: T, addOptions: AddAssetOptions = {}): AssetHandle<T> {
    assertOpen()
    const given = addOptions.id
    const id = typedAssetId<T>(typeof given === 'string' ? createAssetId(given) : given ?? createAssetId())
    if (infos.has(id.uuid)) {
      throw new DuplicateAssetIdError(id.uuid, describeOwner(id))
    }
    const store = ensureStore(type)
    const info = createInfo(id, undefined)
    const handle = Handle.strong(id, info.incarnation, refs)
    store.insert(id, value, { incarnation: info.incarnation })
    info.typeName = type.name
    info.state = { status: 'loaded', degraded: false }
    queuedEvents.push({ type: 'added', id, assetType: type.name, generation: 0 })
    return handle
  }

  function typedHandle<T>(handle: AssetHandle, type: AssetType<T>): AssetHandle<T> | undefined {
    const info = infos.get(handle.id.uuid)
    if (!info || info.incarnation !== handle.incarnation || info.typeName !== type.name) {
      return undefined
    }
    const id = typedAssetId<T>(handle.id)
    return handle.isStrong && !handle.isDropped
      ? Handle.strong(id, handle.incarnation, refs)
      : Handle.weak(id, handle.incarnation)
  }

  function upgradeHandle<T>(handle: HandleLike<T>): AssetHandle<T> | undefined {
    const info = infos.get(handle.id.uuid)
    if (!info || info.incarnation !== handle.incarnation || refs.incarnationOf(handle.id) !== handle.incarnation) {
      return undefined
    }
    return Handle.strong(handle.id, handle.incarnation, refs)
  }

  function ensureStore<T>(type: AssetType<T>): Assets<T> {
    const existing = stores.get(type.name)
    if (existing) {
      if (isStoreOf(existing, type)) {
        return existing
      }
      throw new AssetError('type-mismatch', `Asset type "${type.name}" is registered by another definition`)
    }
    const store = new Assets<T>(type, refs)
    stores.set(type.name, store)
    return store
  }

  function createInfo(id: AssetId, path: AssetPath | undefined): AssetInfo {
    const info: AssetInfo = {
      id,
      path,
      sourceKey: path ? sourceKeyOf(path) : undefined,
      typeName: undefined,
      state: { status: 'requested' },
      incarnation: nextIncarnation(),
      waiters: [],
    }
    infos.set(id.uuid, info)
    refs.track(id, info.incarnation)
    return info
  }

  function lookupInfo(ref: AssetRef): AssetInfo | undefined {
    const info = infos.get(idOf(ref).uuid)
    if (!info || (isHandleLike(ref) && ref.incarnation !== info.incarnation)) {
      return undefined
    }
    return info
  }

  function describeOwner(id: AssetId): string {
    const path = infos.get(id.uuid)?.path
    return path ? `"${formatAssetPath(path)}"` : 'a programmatic asset'
  }

  function storeOf(info: AssetInfo): Assets<unknown> | undefined {
    return info.typeName ? stores.get(info.typeName) : undefined
  }

  function whenSettled(id: AssetId): Promise<LoadState> {
    const info = infos.get(id.uuid)
    if (!info) {
      return Promise.resolve({ status: 'unloaded' })
    }
    if (isTerminal(info.state)) {
      return Promise.resolve(info.state)
    }
    return new Promise(resolve => info.waiters.push(resolve))
  }

  async function setState(info: AssetInfo, state: LoadState): Promise<void> {
    info.state = state
    if (isTerminal(state)) {
      const waiters = info.waiters.splice(0)
      for (const resolve of waiters) {
        resolve(state)
      }
    }
    await callHookSafely(() => hooks.callHook('load:state', info.id, state))
  }

  async function emitEvent(event: AssetEvent): Promise<void> {
    await callHookSafely(() => hooks.callHook('asset:event', event))
  }

  // ---------------------------------------------------------------- load

  function request<T>(path: AssetPath, type: AssetType<T> | undefined, loadOptions: LoadOptions = {}): AssetHandle<T> {
    assertOpen()
    const id = assetIdFromPath<T>(path)
    const key = sourceKeyOf(path)
    let info = infos.get(id.uuid)

    if (info && type && info.typeName && info.typeName !== type.name && info.state.status === 'loaded') {
      throw new AssetTypeMismatchError(formatAssetPath(path), type.name, info.typeName)
    }
    if (!info) {
      info = createInfo(id, path)
    }
    const handle = Handle.strong(id, info.incarnation, refs)

    // 同一源正在加载：挂到已有的加载上
    const pending = inflight.get(key)
    if (pending) {
      attach(pending, info, type)
      return handle
    }
    if (info.state.status !== 'failed' && info.state.status !== 'requested') {
      return handle
    }

    // 源已加载但没有产出该标签：不重新读取
    if (isUnproducedLabel(path, key)) {
      failInfo(info, new MissingLabelError(formatAssetPath(path)))
        .catch(error => logger.error(`Failed to report missing label "${formatAssetPath(path)}":`, error))
      return handle
    }

    // 失败过的路径重新请求时开始新的尝试
    info.state = { status: 'requested' }
    const entry = createInFlight(withoutLabel(path), 'load', {
      policy: loadOptions.policy ?? options.dependencies.policy,
      force: true,
    })
    attach(entry, info, type)
    launch(entry)
    return handle
  }

  function isUnproducedLabel(path: AssetPath, key: string): boolean {
    if (path.label === undefined || !groupIsLoaded(key)) {
      return false
    }
    return !groups.get(key)?.ids.has(assetIdFromPath(path).uuid)
  }

  function attach(entry: InFlightLoad, info: AssetInfo, type: AssetType | undefined): void {
    entry.requested.set(info.id.uuid, info.id)
    if (type) {
      entry.expected.set(info.id.uuid, type)
    }
  }

  function createInFlight(path: AssetPath, reason: InFlightLoad['reason'], init: { policy: DependencyPolicy, force: boolean }): InFlightLoad {
    const entry: InFlightLoad = {
      key: sourceKeyOf(path),
      path,
      reason,
      force: init.force,
      policy: init.policy,
      controller: new AbortController(),
      requested: new Map(),
      expected: new Map(),
      created: new Map(),
      retained: new Map(),
      parseHandles: [],
      previousLinks: new Map(),
      reloadAfter: false,
      done: createDeferred<LoadOutcome>(),
    }
    // 检查与插入之间没有 await
    inflight.set(entry.key, entry)
    return entry
  }

  function launch(entry: InFlightLoad): void {
    // runLoad 自行处理所有错误，完成信号为 entry.done
    void runWithAssetServerContext(server, () => runLoad(entry))
  }

  async function runLoad(entry: InFlightLoad): Promise<void> {
    let outcome: LoadOutcome = { status: 'failed', ids: [] }
    try {
      outcome = await executeLoad(entry)
    }
    catch (error) {
      logger.error(`Unexpected failure while loading "${entry.key}":`, error)
    }
    finally {
      if (inflight.get(entry.key) === entry) {
        inflight.delete(entry.key)
      }
      entry.done.resolve(outcome)
    }

    if (entry.reloadAfter && !closed) {
      queueReload(entry.path).catch(error => logger.error(`Reload of "${entry.key}" failed:`, error))
    }
  }

  function groupIsLoaded(key: string): boolean {
    const group = groups.get(key)
    if (!group || group.ids.size === 0) {
      return false
    }
    for (const uuid of group.ids) {
      if (infos.get(uuid)?.state.status !== 'loaded') {
        return false
      }
    }
    return true
  }

  async function setPendingStates(entry: InFlightLoad, state: LoadState): Promise<void> {
    for (const id of entry.requested.values()) {
      const info = infos.get(id.uuid)
      // 重载时保持 loaded，成功后直接替换
      if (info && info.state.status !== 'loaded') {
        await setState(info, state)
      }
    }
  }

  async function readSource(path: AssetPath, signal: AbortSignal): Promise<Uint8Array> {
    const io = sources.get(path.source)
    if (!io) {
      throw new AssetIoError(formatAssetPath(path), 'unsupported')
    }
    try {
      return await io.read(path.path, { signal })
    }
    catch (error) {
      if (signal.aborted) {
        throw new AssetLoadCancelledError(formatAssetPath(path))
      }
      if (isAssetError(error)) {
        throw error
      }
      throw new AssetIoError(formatAssetPath(path), 'unreadable', { cause: error })
    }
  }

  function throwIfAborted(entry: InFlightLoad): void {
    if (entry.controller.signal.aborted) {
      throw new AssetLoadCancelledError(entry.key)
    }
  }

  function toLoadError(entry: InFlightLoad, error: unknown): AssetLoadError {
    if (entry.controller.signal.aborted) {
      return new AssetLoadCancelledError(entry.key)
    }
    if (isAssetError(error)) {
      return error
    }
    return new AssetIoError(entry.key, 'unreadable', { cause: error })
  }

  async function executeLoad(entry: InFlightLoad): Promise<LoadOutcome> {
    const { path } = entry
    const signal = entry.controller.signal
    try {
      // 1. reading
      await setPendingStates(entry, { status: 'reading' })
      const bytes = await readSource(path, signal)
      throwIfAborted(entry)

      // 2. parsing
      await setPendingStates(entry, { status: 'parsing' })
      const rootType = entry.expected.get(assetIdFromPath(path).uuid)
      const loader = loaders.resolve(path, rootType)
      if (!loader) {
        throw new LoaderNotFoundError(entry.key)
      }
      const imported = await meta.getOrImport({
        path,
        bytes,
        force: entry.force || !groupIsLoaded(entry.key),
        deferSave: true,
        run: fingerprint => importSource(entry, loader, bytes, fingerprint),
      })
      if (imported.status === 'cached') {
        logger.debug(`"${entry.key}" is unchanged, skipping reload`)
        await settleUnchanged(entry, imported.meta)
        return { status: 'cached', ids: [] }
      }
      const parsed = imported.result
      throwIfAborted(entry)

      // 3. 校验请求的标签与类型
      const committable = await rejectUnsatisfiedRequests(entry, parsed)
      for (const asset of committable) {
        const owner = infos.get(asset.id.uuid)
        if (owner && owner.sourceKey !== entry.key) {
          throw new DuplicateAssetIdError(asset.id.uuid, describeOwner(asset.id))
        }
      }

      // 4. 记录依赖边（标记 loaded 之前）
      recordEdges(entry, committable)
      const siblingsMissing = await checkSiblingDependencies(entry, committable)
      retainDependencies(entry, committable)

      // 5. waiting
      const degraded = await waitForDependencies(entry, committable) || siblingsMissing

      // 6. 提交：子资产在前，源资产最后；元数据只记录能提交的结果
      throwIfAborted(entry)
      await meta.save(path, imported.meta)
      const ids = await commit(entry, committable, degraded)
      watchSource(entry.path)
      return { status: 'committed', ids }
    }
    catch (error) {
      await failLoad(entry, toLoadError(entry, error))
      return { status: 'failed', ids: [] }
    }
  }

  // 内容未变：已加载的资产保持原样，记录中没有的请求直接失败
  async function settleUnchanged(entry: InFlightLoad, record: AssetSourceMeta): Promise<void> {
    const produced = new Set(record.produced.map(asset => asset.id))
    for (const uuid of entry.requested.keys()) {
      const info = infos.get(uuid)
      if (!info || info.state.status === 'loaded') {
        continue
      }
      const store = storeOf(info)
      const stored = store?.getEntry(info.id)
      const label = info.path ? formatAssetPath(info.path) : uuid
      if (!store || !stored || !produced.has(uuid)) {
        await failInfo(info, new MissingLabelError(label))
        continue
      }
      const expected = entry.expected.get(uuid)
      if (expected && expected.name !== store.type.name) {
        await failInfo(info, new AssetTypeMismatchError(label, expected.name, store.type.name))
        continue
      }
      await setState(info, { status: 'loaded', degraded: stored.degraded })
    }
  }

  async function importSource(
    entry: InFlightLoad,
    loader: AssetLoader,
    bytes: Uint8Array,
    fingerprint: string,
  ): Promise<{ loader: string, produced: ProducedAssetMeta[], derived: DerivedArtifactMeta[], result: ParsedSource }> {
    const { path } = entry
    const collector = createLoadContext({
      path,
      signal: entry.controller.signal,
      load: (type, dependency) => holdDuringParse(entry, request(dependency, type, { policy: entry.policy })),
      loadUntyped: dependency => holdDuringParse(entry, request(dependency, undefined, { policy: entry.policy })),
      labelHandle: (labelPath, type) => labelHandle(entry, labelPath, type),
      read: (target, signal) => readSource(target, signal),
    })

    let result: LoaderResult<unknown>
    try {
      result = await loader.load(bytes, collector.context)
    }
    catch (error) {
      if (entry.controller.signal.aborted || isAssetError(error)) {
        throw error
      }
      throw new DeserializeError(entry.key, loader.name, { cause: error })
    }
    throwIfAborted(entry)

    const rootDependencies = [
      ...collector.dependencies,
      ...(result.dependencies ?? []).map(input => resolveDependencyInput(path, input)),
    ]
    const assets: ProducedAsset[] = [...collector.labeled.values()].map(labeled => ({
      id: assetIdFromPath({ ...path, label: labeled.label }),
      label: labeled.label,
      path: { ...path, label: labeled.label },
      type: labeled.type,
      value: labeled.value,
      dependencies: labeled.dependencies,
    }))
    assets.push({
      id: assetIdFromPath(path),
      label: null,
      path,
      type: loader.type,
      value: result.value,
      dependencies: rootDependencies,
    })

    // 派生与导入
    const derived: DerivedArtifactMeta[] = []
    for (const asset of assets) {
      const chain = derivations.of(asset.type)
      if (!chain.length) {
        continue
      }
      for (const derivation of chain) {
        asset.value = await derivation.derive(asset.value, { path: asset.path, fingerprint })
      }
      const serializer = serializers.get(asset.type)
      if (!importIO?.write || !serializer) {
        continue
      }
      const artifact = `${importedArtifactHash(asset.path, asset.type.name, serializer.tag)}.${serializer.extension}`
      await importIO.write(artifact, await serializer.serialize(asset.value))
      derived.push({ id: asset.id.uuid, path: artifact, serializer: serializer.tag, sourceFingerprint: fingerprint })
    }

    return {
      loader: loader.name,
      produced: assets.map(asset => ({
        id: asset.id.uuid,
        label: asset.label,
        type: asset.type.name,
        dependencies: asset.dependencies.map(dependency => formatAssetPath(dependency.path)),
      })),
      derived,
      result: { loader: loader.name, assets },
    }
  }

  /** 依赖由 server 代为持有，返回给加载器的是 weak 句柄 */
  function holdDuringParse<T>(entry: InFlightLoad, handle: AssetHandle<T>): AssetHandle<T> {
    entry.parseHandles.push(handle)
    return handle.downgrade()
  }

  function labelHandle<U>(entry: InFlightLoad, path: AssetPath, _type: AssetType<U>): AssetHandle<U> {
    const id = assetIdFromPath<U>(path)
    let info = infos.get(id.uuid)
    if (!info) {
      info = createInfo(id, path)
      entry.created.set(id.uuid, id)
    }
    return Handle.weak(id, info.incarnation)
  }

  async function rejectUnsatisfiedRequests(entry: InFlightLoad, parsed: ParsedSource): Promise<ProducedAsset[]> {
    const byId = new Map(parsed.assets.map(asset => [asset.id.uuid, asset]))
    const rejected = new Set<string>()

    for (const [uuid, id] of entry.requested) {
      const info = infos.get(uuid)
      if (!info) {
        continue
      }
      const asset = byId.get(uuid)
      if (!asset) {
        await failInfo(info, new MissingLabelError(info.path ? formatAssetPath(info.path) : uuid))
        entry.requested.delete(uuid)
        continue
      }
      const expected = entry.expected.get(uuid)
      if (expected && expected.name !== asset.type.name) {
        await failInfo(info, new AssetTypeMismatchError(formatAssetPath(asset.path), expected.name, asset.type.name))
        entry.requested.delete(uuid)
        rejected.add(id.uuid)
      }
    }
    return parsed.assets.filter(asset => !rejected.has(asset.id.uuid))
  }

  function recordEdges(entry: InFlightLoad, assets: ProducedAsset[]): void {
    for (const asset of assets) {
      graph.setGroup(asset.id, entry.key)
      if (!entry.previousLinks.has(asset.id.uuid)) {
        entry.previousLinks.set(asset.id.uuid, graph.dependenciesOf(asset.id))
      }
      graph.clearDependencies(asset.id)
    }
    for (const asset of assets) {
      for (const dependency of asset.dependencies) {
        const dependencyId = assetIdFromPath(dependency.path)
        graph.setGroup(dependencyId, sourceKeyOf(dependency.path))
        // 闭合环时抛出 CyclicDependencyError，由当前资产承担失败
        graph.addEdge(asset.id, dependencyId, { required: dependency.required })
      }
    }
  }

  /**
   * 同一源内的依赖只能指向本次产出的资产，缺失时按依赖策略处理
   * @returns 是否以 degraded 提交
   */
  async function checkSiblingDependencies(entry: InFlightLoad, assets: ProducedAsset[]): Promise<boolean> {
    const produced = new Set(assets.map(asset => asset.id.uuid))
    const missing = new Map<string, AssetPath>()
    for (const asset of assets) {
      for (const dependency of asset.dependencies) {
        const id = assetIdFromPath(dependency.path)
        if (sourceKeyOf(dependency.path) !== entry.key || produced.has(id.uuid)) {
          continue
        }
        const info = infos.get(id.uuid)
        if (info && !isTerminal(info.state)) {
          await failInfo(info, new MissingLabelError(formatAssetPath(dependency.path)))
        }
        if (dependency.required) {
          missing.set(id.uuid, dependency.path)
        }
      }
    }
    if (!missing.size) {
      return false
    }
    const paths = [...missing.values()].map(path => formatAssetPath(path))
    if (entry.policy === 'best-effort') {
      logger.warn(`"${entry.key}" loaded without: ${paths.join(', ')}`)
      return true
    }
    throw new DependencyFailedError(entry.key, paths)
  }

  function retainDependencies(entry: InFlightLoad, assets: ProducedAsset[]): void {
    const root = assets.find(asset => asset.label === null)
    for (const asset of assets) {
      // 同源资产由源资产持有，不再单独请求
      const handles = asset.dependencies
        .filter(dependency => sourceKeyOf(dependency.path) !== entry.key)
        .map(dependency => request(dependency.path, undefined, { policy: entry.policy }))
      entry.retained.set(asset.id.uuid, handles)
    }
    // 子资产的生命周期跟随源资产
    if (root) {
      const held = entry.retained.get(root.id.uuid) ?? []
      for (const asset of assets) {
        if (asset.label === null) {
          continue
        }
        let info = infos.get(asset.id.uuid)
        if (!info) {
          info = createInfo(asset.id, asset.path)
          entry.created.set(asset.id.uuid, asset.id)
        }
        held.push(Handle.strong(asset.id, info.incarnation, refs))
      }
      entry.retained.set(root.id.uuid, held)
    }
    releaseParseHandles(entry)
  }

  function releaseParseHandles(entry: InFlightLoad): void {
    for (const handle of entry.parseHandles.splice(0)) {
      handle.drop()
    }
  }

  async function waitForDependencies(entry: InFlightLoad, assets: ProducedAsset[]): Promise<boolean> {
    const blocking = new Map<string, { id: AssetId, path: AssetPath }>()
    for (const asset of assets) {
      for (const dependency of asset.dependencies) {
        // 同一源的子资产一起提交，不需要等待
        if (!dependency.required || sourceKeyOf(dependency.path) === entry.key) {
          continue
        }
        const id = assetIdFromPath(dependency.path)
        blocking.set(id.uuid, { id, path: dependency.path })
      }
    }

    const pending = [...blocking.values()].filter(({ id }) => {
      const state = infos.get(id.uuid)?.state
      return !state || !isTerminal(state)
    })
    if (pending.length) {
      await setPendingStates(entry, { status: 'waiting', pending: pending.length })
      await untilSettled(entry, pending.map(({ id }) => id))
    }

    const failed = [...blocking.values()].filter(({ id }) => infos.get(id.uuid)?.state.status !== 'loaded')
    if (!failed.length) {
      return false
    }
    if (entry.policy === 'best-effort') {
      logger.warn(`"${entry.key}" loaded without: ${failed.map(({ path }) => formatAssetPath(path)).join(', ')}`)
      return true
    }
    throw new DependencyFailedError(entry.key, failed.map(({ path }) => formatAssetPath(path)))
  }

  function untilSettled(entry: InFlightLoad, ids: AssetId[]): Promise<void> {
    const signal = entry.controller.signal
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new AssetLoadCancelledError(entry.key))
        return
      }
      const onAbort = (): void => reject(new AssetLoadCancelledError(entry.key))
      signal.addEventListener('abort', onAbort, { once: true })
      Promise.all(ids.map(id => whenSettled(id))).then(() => {
        signal.removeEventListener('abort', onAbort)
        resolve()
      }, reject)
    })
  }

  async function commit(entry: InFlightLoad, assets: ProducedAsset[], degraded: boolean): Promise<AssetId[]> {
    let group = groups.get(entry.key)
    if (!group) {
      group = { path: entry.path, ids: new Set() }
      groups.set(entry.key, group)
    }

    const committed: AssetId[] = []
    for (const asset of assets) {
      const info = infos.get(asset.id.uuid) ?? createInfo(asset.id, asset.path)
      // 类型变化时从旧存储中移除
      const previousStore = storeOf(info)
      if (previousStore && previousStore.type.name !== asset.type.name) {
        previousStore.remove(asset.id)
      }
      const store = ensureStore(asset.type)
      const outcome = store.insert(asset.id, asset.value, { incarnation: info.incarnation, degraded })
      info.typeName = asset.type.name
      group.ids.add(asset.id.uuid)

      const previous = retained.get(asset.id.uuid)
      retained.set(asset.id.uuid, entry.retained.get(asset.id.uuid) ?? [])
      entry.retained.delete(asset.id.uuid)
      for (const handle of previous ?? []) {
        handle.drop()
      }

      await setState(info, { status: 'loaded', degraded })
      await emitEvent({
        type: outcome,
        id: asset.id,
        assetType: asset.type.name,
        path: asset.path,
        generation: store.getEntry(asset.id)?.generation ?? 0,
      })
      if (refs.count(asset.id) === 0) {
        refs.requeue(asset.id)
      }
      committed.push(asset.id)
    }
    logger.debug(`Loaded "${entry.key}" (${committed.length} asset(s))`)
    return committed
  }

  async function failInfo(info: AssetInfo, error: AssetLoadError): Promise<void> {
    await setState(info, { status: 'failed', error })
    await callHookSafely(() => hooks.callHook('asset:failed', info.id, error, info.path))
    if (refs.count(info.id) === 0) {
      refs.requeue(info.id)
    }
  }

  async function failLoad(entry: InFlightLoad, error: AssetLoadError): Promise<void> {
    // 放弃本次尝试持有的依赖句柄，恢复旧的依赖边
    for (const handles of entry.retained.values()) {
      for (const handle of handles) {
        handle.drop()
      }
    }
    entry.retained.clear()
    releaseParseHandles(entry)
    for (const [uuid, links] of entry.previousLinks) {
      const id = infos.get(uuid)?.id ?? createAssetId(uuid)
      graph.clearDependencies(id)
      for (const link of links) {
        try {
          graph.addEdge(id, link.id, { required: link.required })
        }
        catch (restoreError) {
          logger.debug(`Dropped dependency edge of ${uuid}:`, restoreError)
        }
      }
    }

    const ids = new Map([...entry.requested, ...entry.created])
    if (error.kind === 'cancelled') {
      logger.debug(`Load of "${entry.key}" cancelled`)
    }
    else {
      logger.error(`Failed to load "${entry.key}": ${error.message}`)
    }
    for (const id of ids.values()) {
      const info = infos.get(id.uuid)
      if (info) {
        await failInfo(info, error)
      }
    }
  }

  // ---------------------------------------------------------------- reload

  function queueReload(path: AssetPath): Promise<void> {
    const run = reloadChain.then(() => reloadSource(path))
    reloadChain = run.catch(error => logger.error(`Reload of "${sourceKeyOf(path)}" failed:`, error))
    return run
  }

  function hasAssetsFrom(key: string): boolean {
    if (groups.has(key)) {
      return true
    }
    for (const info of infos.values()) {
      if (info.sourceKey === key) {
        return true
      }
    }
    return false
  }

  async function reloadGroup(path: AssetPath, force: boolean): Promise<LoadOutcome | undefined> {
    const key = sourceKeyOf(path)
    const pending = inflight.get(key)
    if (pending) {
      // 当前加载结束后再重载一次
      pending.reloadAfter = true
      return undefined
    }
    const entry = createInFlight(path, 'reload', { policy: options.dependencies.policy, force })
    for (const info of infos.values()) {
      if (info.sourceKey === key) {
        entry.requested.set(info.id.uuid, info.id)
      }
    }
    launch(entry)
    return entry.done.promise
  }

  async function reloadSource(path: AssetPath): Promise<void> {
    if (closed) {
      return
    }
    const key = sourceKeyOf(path)
    if (!hasAssetsFrom(key)) {
      logger.debug(`Ignoring reload of "${key}": not loaded`)
      return
    }

    const origin = await reloadGroup(path, false)
    if (!origin || origin.status !== 'committed') {
      return
    }

    // 依赖方按依赖顺序重载，visited 防止环与重复
    const changed = [...origin.ids]
    const visited = new Set([key])
    for (const id of graph.reloadOrder(origin.ids)) {
      const dependentKey = graph.groupOf(id)
      if (dependentKey === undefined || visited.has(dependentKey)) {
        continue
      }
      visited.add(dependentKey)
      const group = groups.get(dependentKey)
      if (!group) {
        continue
      }
      const outcome = await reloadGroup(group.path, true)
      if (outcome?.status === 'committed') {
        changed.push(...outcome.ids)
      }
    }
    await callHookSafely(() => hooks.callHook('reload:done', changed))
  }

  function watchSource(path: AssetPath): void {
    const key = sourceKeyOf(path)
    const group = groups.get(key)
    const io = sources.get(path.source)
    if (!options.watch.enabled || !group || group.unwatch || !io?.watch) {
      return
    }
    const onChange = debounce(() => {
      handleSourceChange(path).catch(error => logger.error(`Failed to handle change of "${key}":`, error))
    }, options.watch.debounceMs)
    const stop = io.watch(path.path, () => onChange())
    group.unwatch = async () => {
      onChange.cancel()
      await stop()
    }
  }

  async function handleSourceChange(path: AssetPath): Promise<void> {
    if (closed) {
      return
    }
    await callHookSafely(() => hooks.callHook('source:changed', path))
    await queueReload(path)
  }

  // ---------------------------------------------------------------- removal

  function evict(id: AssetId, events: AssetEvent[]): void {
    const info = infos.get(id.uuid)
    if (!info) {
      return
    }
    const store = storeOf(info)
    const entry = store?.remove(id)
    if (store && entry) {
      events.push({ type: 'removed', id, assetType: store.type.name, path: info.path, generation: entry.generation })
    }

    infos.delete(id.uuid)
    refs.forget(id)
    graph.removeNode(id)
    const waiters = info.waiters.splice(0)
    for (const resolve of waiters) {
      resolve({ status: 'unloaded' })
    }

    if (info.sourceKey !== undefined) {
      const group = groups.get(info.sourceKey)
      group?.ids.delete(id.uuid)
      if (group && group.ids.size === 0) {
        groups.delete(info.sourceKey)
        group.unwatch?.().catch(error => logger.warn(`Failed to stop watching "${info.sourceKey}":`, error))
      }
    }

    // 释放持有的依赖，可能级联进入删除队列
    const held = retained.get(id.uuid)
    retained.delete(id.uuid)
    for (const handle of held ?? []) {
      handle.drop()
    }
  }

  async function processUpdate(): Promise<AssetEvent[]> {
    const events: AssetEvent[] = queuedEvents.splice(0)
    const deferred: AssetId[] = []

    for (let ids = refs.drainZeroed(); ids.length; ids = refs.drainZeroed()) {
      for (const id of ids) {
        const info = infos.get(id.uuid)
        if (!info || refs.count(id) > 0) {
          continue
        }
        // 加载中的资产留到下一次
        if (!isTerminal(info.state)) {
          deferred.push(id)
          continue
        }
        evict(id, events)
      }
    }
    for (const id of deferred) {
      refs.requeue(id)
    }

    for (const store of stores.values()) {
      for (const entry of store.drainTouched()) {
        events.push({
          type: 'modified',
          id: entry.id,
          assetType: store.type.name,
          path: infos.get(entry.id.uuid)?.path,
          generation: entry.generation,
        })
      }
    }

    for (const event of events) {
      await emitEvent(event)
    }
    return events
  }

  async function unloadSource(path: AssetPath): Promise<void> {
    const key = sourceKeyOf(path)
    const pending = inflight.get(key)
    if (pending) {
      pending.controller.abort()
      await pending.done.promise
    }

    const events: AssetEvent[] = []
    const group = groups.get(key)
    for (const uuid of [...(group?.ids ?? [])]) {
      const info = infos.get(uuid)
      if (info) {
        evict(info.id, events)
      }
    }
    meta.forget(path)
    for (const event of events) {
      await emitEvent(event)
    }
  }

  return server
}
