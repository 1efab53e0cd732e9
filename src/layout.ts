import type { TreeArena } from './tree-arena'
import type { LayoutMap, NodeId, Point, Rect } from './types'

export const DEFAULT_CELL_ASPECT = 2

export interface LayoutOptions {
  /**
   * How many times taller a terminal cell is than it is wide
   */
  cellAspect?: number
}

export function containsPoint(rect: Rect, point: Point) {
  return (
    point.x >= rect.x &&
    point.x < rect.x + rect.width &&
    point.y >= rect.y &&
    point.y < rect.y + rect.height
  )
}

export function area(rect: Rect) {
  return rect.width * rect.height
}

/**
 * Slice-and-dice layout. Children cut their parent's rectangle along its
 * longer side, each one getting a share proportional to its effective weight.
 * Every child but the last is floored, and the last takes what is left, so
 * the cells of the parent are covered exactly. While there are at least as
 * many cells as children, no child gets less than one.
 */
export function computeLayout(
  arena: TreeArena,
  viewport: Rect,
  options: LayoutOptions = {}
): LayoutMap {
  const cellAspect = options.cellAspect ?? DEFAULT_CELL_ASPECT
  const layout: LayoutMap = new Map()

  const place = (id: NodeId, rect: Rect) => {
    layout.set(id, rect)
    const node = arena.get(id)
    if (!node.expanded || node.children.length === 0) {
      return
    }

    const total = node.children.reduce(
      (prev, childId) => prev + arena.effectiveWeight(childId),
      0
    )
    const alongHeight = rect.height * cellAspect >= rect.width
    const length = alongHeight ? rect.height : rect.width
    const count = node.children.length
    let offset = 0
    node.children.forEach((childId, index) => {
      const isLast = index === count - 1
      let share = isLast
        ? length - offset
        : Math.floor((arena.effectiveWeight(childId) / total) * length)
      if (!isLast && length >= count) {
        // keep at least one cell for this child and each one after it
        const later = count - 1 - index
        share = Math.min(Math.max(share, 1), length - offset - later)
      }
      place(
        childId,
        alongHeight
          ? { x: rect.x, y: rect.y + offset, width: rect.width, height: share }
          : { x: rect.x + offset, y: rect.y, width: share, height: rect.height }
      )
      offset += share
    })
  }

  place(arena.rootId, {
    x: viewport.x,
    y: viewport.y,
    width: Math.max(0, viewport.width),
    height: Math.max(0, viewport.height),
  })
  return layout
}

/**
 * Returns the visible node whose rectangle holds `point`. A point on an edge
 * shared by two rectangles belongs to the one closer to the origin.
 */
export function findNodeAt(
  layout: LayoutMap,
  visible: NodeId[],
  point: Point
): NodeId | null {
  for (const id of visible) {
    const rect = layout.get(id)
    if (rect && containsPoint(rect, point)) {
      return id
    }
  }
  return null
}
