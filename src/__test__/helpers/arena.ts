import * as path from 'path'
import { TreeArena } from '../../tree-arena'
import type { NodeId } from '../../types'

/** Nested description of a directory: numbers are file sizes in bytes */
export interface SizeSpec {
  [name: string]: number | SizeSpec
}

export function buildArena(rootPath: string, spec: SizeSpec): TreeArena {
  const arena = new TreeArena()
  const fill = (dirId: NodeId, dirPath: string, entries: SizeSpec): number => {
    let total = 0
    for (const [name, entry] of Object.entries(entries)) {
      const entryPath = path.posix.join(dirPath, name)
      if (typeof entry === 'number') {
        arena.add({ name, path: entryPath, kind: 'file', size: entry }, dirId)
        total += entry
      } else {
        const childId = arena.add({ name, path: entryPath, kind: 'directory' }, dirId)
        total += fill(childId, entryPath, entry)
      }
    }
    arena.get(dirId).size = total
    return total
  }
  const rootId = arena.add({
    name: path.posix.basename(rootPath),
    path: rootPath,
    kind: 'directory',
  })
  fill(rootId, rootPath, spec)
  return arena
}

export function idOf(arena: TreeArena, nodePath: string): NodeId {
  const node = arena.findByPath(nodePath)
  if (!node) {
    throw new Error(`No node at '${nodePath}'`)
  }
  return node.id
}
