import type { AssetId } from '@stowage/schema'
import { describe, expect, it } from 'vitest'
import { createAssetId, CyclicDependencyError } from '../src'
import { createDependencyGraph } from '../src/internal'

function node(name: string): AssetId {
  return createAssetId(name)
}

function uuids(ids: AssetId[]): string[] {
  return ids.map(id => id.uuid)
}

describe('dependency graph', () => {
  it('should record edges both ways', () => {
    const graph = createDependencyGraph()
    const [mesh, texture] = [node('mesh'), node('texture')]
    graph.setGroup(mesh, 'mesh.gltf')
    graph.setGroup(texture, 'texture.png')
    graph.addEdge(mesh, texture)

    expect(graph.dependenciesOf(mesh)).toEqual([{ id: texture, required: true }])
    expect(graph.dependentsOf(texture)).toEqual([mesh])
    expect(graph.edges()).toEqual([{ dependent: mesh, dependency: texture, required: true }])
  })

  it('闭合环的边被拒绝', () => {
    const graph = createDependencyGraph()
    const [a, b] = [node('a'), node('b')]
    graph.setGroup(a, 'a.json')
    graph.setGroup(b, 'b.json')
    graph.addEdge(a, b)

    let error: unknown
    try {
      graph.addEdge(b, a)
    }
    catch (e) {
      error = e
    }
    expect(error).toBeInstanceOf(CyclicDependencyError)
    expect(error).toMatchObject({
      kind: 'cyclic-dependency',
      cycle: ['b.json', 'a.json', 'b.json'],
      message: 'Cyclic dependency detected: b.json -> a.json -> b.json',
    })
    expect(graph.dependenciesOf(b)).toEqual([])
  })

  it('self dependency is a cycle', () => {
    const graph = createDependencyGraph()
    const a = node('a')
    graph.setGroup(a, 'a.json')
    expect(() => graph.addEdge(a, a)).toThrowError('Cyclic dependency detected: a.json -> a.json')
  })

  it('可选依赖不参与环检测', () => {
    const graph = createDependencyGraph()
    const [a, b] = [node('a'), node('b')]
    graph.setGroup(a, 'a.json')
    graph.setGroup(b, 'b.json')
    graph.addEdge(a, b)
    graph.addEdge(b, a, { required: false })
    expect(graph.findCycle(b, a)).toEqual(['b.json', 'a.json', 'b.json'])
    expect(graph.dependenciesOf(b)).toEqual([{ id: a, required: false }])
  })

  it('同组资产之间不算环', () => {
    const graph = createDependencyGraph()
    const [root, child] = [node('root'), node('child')]
    graph.setGroup(root, 'mesh.gltf')
    graph.setGroup(child, 'mesh.gltf')
    graph.addEdge(root, child)
    graph.addEdge(child, root)
    expect(graph.dependentsOf(root)).toEqual([child])
  })

  it('should find longer cycles through groups', () => {
    const graph = createDependencyGraph()
    const [a, b, c] = [node('a'), node('b'), node('c')]
    graph.setGroup(a, 'a')
    graph.setGroup(b, 'b')
    graph.setGroup(c, 'c')
    graph.addEdge(a, b)
    graph.addEdge(b, c)
    expect(() => graph.addEdge(c, a)).toThrowError('Cyclic dependency detected: c -> a -> b -> c')
  })

  it('重复声明时必需标记取或', () => {
    const graph = createDependencyGraph()
    const [a, b] = [node('a'), node('b')]
    graph.addEdge(a, b, { required: false })
    graph.addEdge(a, b)
    graph.addEdge(a, b, { required: false })
    expect(graph.dependenciesOf(a)).toEqual([{ id: b, required: true }])
  })

  it('reloadOrder 依赖在前', () => {
    const graph = createDependencyGraph()
    const [a, b, c, d] = [node('a'), node('b'), node('c'), node('d')]
    graph.addEdge(b, a)
    graph.addEdge(c, a)
    graph.addEdge(d, b)
    graph.addEdge(d, c)

    expect(uuids(graph.reloadOrder([a]))).toEqual(['a', 'b', 'c', 'd'])
    expect(uuids(graph.reloadOrder([c]))).toEqual(['c', 'd'])
    expect(uuids(graph.reloadOrder([d]))).toEqual(['d'])
  })

  it('reloadOrder terminates on optional cycles', () => {
    const graph = createDependencyGraph()
    const [a, b] = [node('a'), node('b')]
    graph.addEdge(a, b, { required: false })
    graph.addEdge(b, a, { required: false })
    expect(uuids(graph.reloadOrder([a])).sort()).toEqual(['a', 'b'])
  })

  it('removeNode 保留入边', () => {
    const graph = createDependencyGraph()
    const [a, b, c] = [node('a'), node('b'), node('c')]
    graph.setGroup(b, 'b')
    graph.addEdge(b, a)
    graph.addEdge(c, b)

    graph.removeNode(b)
    expect(graph.dependenciesOf(b)).toEqual([])
    expect(graph.dependentsOf(a)).toEqual([])
    expect(graph.dependentsOf(b)).toEqual([c])
    expect(graph.groupOf(b)).toBeUndefined()
  })

  it('clearDependencies', () => {
    const graph = createDependencyGraph()
    const [a, b] = [node('a'), node('b')]
    graph.addEdge(a, b)
    graph.clearDependencies(a)
    expect(graph.edges()).toEqual([])
    expect(graph.dependentsOf(b)).toEqual([])
  })
})
