import type { NodeId, NodeKind, TreeNode } from './types'

export const MIN_WEIGHT = 1

function createOutOfRangeError(id: NodeId) {
  return new RangeError(`Node with id ${id} does not exist in the tree.`)
}

/**
 * Flat store for the scanned tree. Nodes refer to each other by id, so the
 * structure can be walked in either direction without owning references.
 * The first node added is the root.
 */
export class TreeArena {
  private readonly nodes: TreeNode[] = []

  get rootId(): NodeId {
    if (this.nodes.length === 0) {
      throw createOutOfRangeError(0)
    }
    return 0
  }

  get size() {
    return this.nodes.length
  }

  add(
    entry: {
      name: string
      path: string
      kind: NodeKind
      size?: number
      error?: string
    },
    parent: NodeId | null = null
  ): NodeId {
    if (parent === null && this.nodes.length > 0) {
      throw new Error('The tree already has a root.')
    }
    const id = this.nodes.length
    const node: TreeNode = {
      id,
      name: entry.name,
      path: entry.path,
      kind: entry.kind,
      size: entry.size ?? 0,
      parent,
      children: [],
      // the root is always shown opened
      expanded: parent === null && entry.kind === 'directory',
      visualWeight: null,
    }
    if (entry.error !== undefined) {
      node.error = entry.error
    }
    if (parent !== null) {
      const parentNode = this.get(parent)
      if (parentNode.kind !== 'directory') {
        throw new Error(`Can't add '${entry.name}' under file '${parentNode.path}'.`)
      }
      parentNode.children.push(id)
    }
    this.nodes.push(node)
    return id
  }

  get(id: NodeId): TreeNode {
    const node = this.nodes[id]
    if (!node) {
      throw createOutOfRangeError(id)
    }
    return node
  }

  has(id: NodeId) {
    return Number.isInteger(id) && id >= 0 && id < this.nodes.length
  }

  ids(): NodeId[] {
    return this.nodes.map((node) => node.id)
  }

  findByPath(absPath: string): TreeNode | undefined {
    return this.nodes.find((node) => node.path === absPath)
  }

  isDirectory(id: NodeId) {
    return this.get(id).kind === 'directory'
  }

  isRoot(id: NodeId) {
    return this.get(id).parent === null
  }

  /**
   * Ancestors of `id`, ordered from the root down to its parent.
   */
  ancestors(id: NodeId): NodeId[] {
    const chain: NodeId[] = []
    let parent = this.get(id).parent
    while (parent !== null) {
      chain.unshift(parent)
      parent = this.get(parent).parent
    }
    return chain
  }

  depth(id: NodeId) {
    return this.ancestors(id).length
  }

  descendants(id: NodeId): NodeId[] {
    const collected: NodeId[] = []
    const stack = [...this.get(id).children].reverse()
    while (stack.length > 0) {
      const next = stack.pop()
      if (next === undefined) break
      collected.push(next)
      stack.push(...[...this.get(next).children].reverse())
    }
    return collected
  }

  siblings(id: NodeId): NodeId[] {
    const { parent } = this.get(id)
    return parent === null ? [id] : [...this.get(parent).children]
  }

  effectiveWeight(id: NodeId) {
    const node = this.get(id)
    return node.visualWeight ?? Math.max(node.size, MIN_WEIGHT)
  }

  /**
   * Share of the parent's area the node receives, in [0, 1].
   */
  visualShare(id: NodeId) {
    const total = this.siblings(id).reduce(
      (prev, sibling) => prev + this.effectiveWeight(sibling),
      0
    )
    return this.effectiveWeight(id) / total
  }

  /**
   * The nodes currently drawn as blocks: walking down from the root, every
   * opened directory with children is replaced by its children.
   */
  visibleNodes(): NodeId[] {
    const visible: NodeId[] = []
    const collect = (id: NodeId) => {
      const node = this.get(id)
      if (node.expanded && node.children.length > 0) {
        node.children.forEach(collect)
      } else {
        visible.push(id)
      }
    }
    collect(this.rootId)
    return visible
  }

  getPathString(id: NodeId) {
    const node = this.get(id)
    return `${node.path}${node.kind === 'directory' ? ' (folder)' : ' (file)'}`
  }
}
