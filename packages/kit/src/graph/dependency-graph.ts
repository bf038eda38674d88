import type { AssetId, DependencyEdge } from '@stowage/schema'
import { CyclicDependencyError } from '../errors'

export interface DependencyLink {
  id: AssetId
  required: boolean
}

export interface AddEdgeOptions {
  required?: boolean
}

interface GraphNode {
  id: AssetId
  group: string | undefined
  dependencies: Map<string, DependencyLink>
  dependents: Set<string>
}

/**
 * 资产依赖图
 * 节点按 group（源路径）归组，同一源产出的资产一起提交，环检测在 group 之间进行
 */
export interface DependencyGraph {
  setGroup: (id: AssetId, group: string) => void
  groupOf: (id: AssetId) => string | undefined
  /** 会闭合必需依赖环时抛出 CyclicDependencyError，边不会被记录 */
  addEdge: (dependent: AssetId, dependency: AssetId, options?: AddEdgeOptions) => void
  findCycle: (dependent: AssetId, dependency: AssetId) => string[] | undefined
  dependenciesOf: (id: AssetId) => DependencyLink[]
  dependentsOf: (id: AssetId) => AssetId[]
  clearDependencies: (id: AssetId) => void
  /** 移除节点及其出边；入边保留，依赖方仍指向该路径 */
  removeNode: (id: AssetId) => void
  /** roots 及其所有传递依赖方，依赖在前 */
  reloadOrder: (roots: AssetId[]) => AssetId[]
  edges: () => DependencyEdge[]
}

export function createDependencyGraph(): DependencyGraph {
  const nodes = new Map<string, GraphNode>()
  const members = new Map<string, Set<string>>()

  const ensure = (id: AssetId): GraphNode => {
    let node = nodes.get(id.uuid)
    if (!node) {
      node = { id, group: undefined, dependencies: new Map(), dependents: new Set() }
      nodes.set(id.uuid, node)
    }
    return node
  }

  const leaveGroup = (node: GraphNode): void => {
    if (node.group === undefined) {
      return
    }
    const set = members.get(node.group)
    set?.delete(node.id.uuid)
    if (set && set.size === 0) {
      members.delete(node.group)
    }
    node.group = undefined
  }

  // group 级别的必需依赖
  const requiredGroupsOf = (group: string): Set<string> => {
    const result = new Set<string>()
    for (const uuid of members.get(group) ?? []) {
      const node = nodes.get(uuid)
      if (!node) {
        continue
      }
      for (const link of node.dependencies.values()) {
        const target = nodes.get(link.id.uuid)?.group
        if (link.required && target !== undefined && target !== group) {
          result.add(target)
        }
      }
    }
    return result
  }

  // BFS，返回 from -> ... -> to 的 group 路径
  const findGroupPath = (from: string, to: string): string[] | undefined => {
    const previous = new Map<string, string>()
    const queue = [from]
    const seen = new Set([from])
    while (queue.length) {
      const current = queue.shift()
      if (current === undefined) {
        break
      }
      if (current === to) {
        const path = [to]
        let cursor = to
        while (cursor !== from) {
          const prev = previous.get(cursor)
          if (prev === undefined) {
            break
          }
          path.unshift(prev)
          cursor = prev
        }
        return path
      }
      for (const next of requiredGroupsOf(current)) {
        if (!seen.has(next)) {
          seen.add(next)
          previous.set(next, current)
          queue.push(next)
        }
      }
    }
    return undefined
  }

  const findCycle = (dependent: AssetId, dependency: AssetId): string[] | undefined => {
    if (dependent.uuid === dependency.uuid) {
      const self = nodes.get(dependent.uuid)?.group ?? dependent.uuid
      return [self, self]
    }
    const from = nodes.get(dependent.uuid)?.group
    const to = nodes.get(dependency.uuid)?.group
    // 同组资产一起提交，不会互相等待
    if (from === undefined || to === undefined || from === to) {
      return undefined
    }
    const back = findGroupPath(to, from)
    return back ? [from, ...back] : undefined
  }

  const clearDependencies = (id: AssetId): void => {
    const node = nodes.get(id.uuid)
    if (!node) {
      return
    }
    for (const link of node.dependencies.values()) {
      nodes.get(link.id.uuid)?.dependents.delete(id.uuid)
    }
    node.dependencies.clear()
  }

  return {
    setGroup: (id, group) => {
      const node = ensure(id)
      if (node.group === group) {
        return
      }
      leaveGroup(node)
      node.group = group
      let set = members.get(group)
      if (!set) {
        set = new Set()
        members.set(group, set)
      }
      set.add(id.uuid)
    },
    groupOf: id => nodes.get(id.uuid)?.group,
    addEdge: (dependent, dependency, options = {}) => {
      const required = options.required ?? true
      if (required) {
        const cycle = findCycle(dependent, dependency)
        if (cycle) {
          throw new CyclicDependencyError(cycle)
        }
      }
      const from = ensure(dependent)
      const to = ensure(dependency)
      const existing = from.dependencies.get(dependency.uuid)
      // 同一依赖被重复声明时，只要有一次是必需的就按必需处理
      from.dependencies.set(dependency.uuid, {
        id: dependency,
        required: required || (existing?.required ?? false),
      })
      to.dependents.add(dependent.uuid)
    },
    findCycle,
    dependenciesOf: id => [...(nodes.get(id.uuid)?.dependencies.values() ?? [])],
    dependentsOf: (id) => {
      const node = nodes.get(id.uuid)
      if (!node) {
        return []
      }
      const result: AssetId[] = []
      for (const uuid of node.dependents) {
        const dependent = nodes.get(uuid)
        if (dependent) {
          result.push(dependent.id)
        }
      }
      return result
    },
    clearDependencies,
    removeNode: (id) => {
      const node = nodes.get(id.uuid)
      if (!node) {
        return
      }
      clearDependencies(id)
      leaveGroup(node)
      if (node.dependents.size === 0) {
        nodes.delete(id.uuid)
      }
    },
    reloadOrder: (roots) => {
      // 1. 收集 roots 与传递依赖方，visited 防止环与重复
      const visited = new Map<string, AssetId>()
      const stack = [...roots]
      while (stack.length) {
        const id = stack.pop()
        if (!id || visited.has(id.uuid)) {
          continue
        }
        visited.set(id.uuid, id)
        for (const uuid of nodes.get(id.uuid)?.dependents ?? []) {
          const dependent = nodes.get(uuid)
          if (dependent && !visited.has(uuid)) {
            stack.push(dependent.id)
          }
        }
      }

      // 2. 在子图内做拓扑排序，依赖在前
      const inDegree = new Map<string, number>()
      for (const uuid of visited.keys()) {
        let degree = 0
        for (const link of nodes.get(uuid)?.dependencies.values() ?? []) {
          if (visited.has(link.id.uuid) && link.id.uuid !== uuid) {
            degree++
          }
        }
        inDegree.set(uuid, degree)
      }

      const order: AssetId[] = []
      const ready = [...visited.keys()].filter(uuid => inDegree.get(uuid) === 0)
      while (ready.length) {
        const uuid = ready.shift()
        if (uuid === undefined) {
          break
        }
        const id = visited.get(uuid)
        if (id) {
          order.push(id)
        }
        for (const dependent of nodes.get(uuid)?.dependents ?? []) {
          const degree = inDegree.get(dependent)
          if (degree === undefined || dependent === uuid) {
            continue
          }
          inDegree.set(dependent, degree - 1)
          if (degree - 1 === 0) {
            ready.push(dependent)
          }
        }
      }

      // 可选依赖可能成环，剩余节点按发现顺序追加
      if (order.length < visited.size) {
        const placed = new Set(order.map(id => id.uuid))
        for (const [uuid, id] of visited) {
          if (!placed.has(uuid)) {
            order.push(id)
          }
        }
      }
      return order
    },
    edges: () => {
      const result: DependencyEdge[] = []
      for (const node of nodes.values()) {
        for (const link of node.dependencies.values()) {
          result.push({ dependent: node.id, dependency: link.id, required: link.required })
        }
      }
      return result
    },
  }
}
