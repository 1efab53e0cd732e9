import { MIN_WEIGHT } from './tree-arena'
import { computeLayout, findNodeAt } from './layout'
import type { TreeArena } from './tree-arena'
import type { Command, LayoutMap, NodeId, Point, Rect } from './types'

export const DEFAULT_STEP = 0.05

export interface SessionOptions {
  step?: number
  cellAspect?: number
}

/**
 * Interactive state of one treemap run: what is selected, how big the screen
 * is and where every block currently sits. Commands only touch the
 * `expanded` and `visualWeight` fields of the tree.
 */
export class TreemapSession {
  selected: NodeId | null = null
  private viewport: Rect = { x: 0, y: 0, width: 0, height: 0 }
  private currentLayout: LayoutMap = new Map()
  private readonly step: number
  private readonly cellAspect: number | undefined

  constructor(readonly arena: TreeArena, options: SessionOptions = {}) {
    this.step = options.step ?? DEFAULT_STEP
    this.cellAspect = options.cellAspect
  }

  get layout(): LayoutMap {
    return this.currentLayout
  }

  get visible(): NodeId[] {
    return this.arena.visibleNodes()
  }

  resize(viewport: Rect) {
    this.viewport = { ...viewport }
    this.relayout()
  }

  relayout() {
    this.currentLayout = computeLayout(this.arena, this.viewport, {
      cellAspect: this.cellAspect,
    })
  }

  /**
   * Selects the block under `point`. Misses keep the current selection.
   */
  click(point: Point) {
    const hit = findNodeAt(this.currentLayout, this.visible, point)
    if (hit === null || hit === this.selected) {
      return false
    }
    this.selected = hit
    return true
  }

  select(id: NodeId | null) {
    this.selected = id !== null && this.arena.has(id) ? id : null
  }

  dispatch(command: Command) {
    const changed = this.apply(command)
    if (changed) {
      this.relayout()
    }
    return changed
  }

  private apply(command: Command): boolean {
    if (command === 'collapse-all') {
      return this.collapseAll()
    }
    if (this.selected === null) {
      return false
    }
    switch (command) {
      case 'grow':
        return this.resizeWeight(this.selected, 1)
      case 'shrink':
        return this.resizeWeight(this.selected, -1)
      case 'expand':
        return this.expand(this.selected)
      case 'expand-path':
        return this.expandPath(this.selected)
      case 'collapse':
        return this.collapse(this.selected)
    }
  }

  private resizeWeight(id: NodeId, direction: 1 | -1) {
    const current = this.arena.effectiveWeight(id)
    const delta = Math.max(1, Math.ceil(current * this.step))
    const next =
      direction > 0 ? current + delta : Math.max(MIN_WEIGHT, current - delta)
    if (next === current) {
      return false
    }
    this.arena.get(id).visualWeight = next
    return true
  }

  private setExpanded(id: NodeId, expanded: boolean) {
    const node = this.arena.get(id)
    if (node.kind !== 'directory' || node.expanded === expanded) {
      return false
    }
    node.expanded = expanded
    return true
  }

  // a directory under a closed ancestor stays closed, so that opening the
  // ancestor later shows its own children
  private isShown(id: NodeId) {
    return this.arena.ancestors(id).every((ancestor) => this.arena.get(ancestor).expanded)
  }

  private expand(id: NodeId) {
    if (!this.isShown(id)) {
      return false
    }
    return this.setExpanded(id, true)
  }

  private expandPath(id: NodeId) {
    let changed = false
    for (const ancestor of this.arena.ancestors(id)) {
      changed = this.setExpanded(ancestor, true) || changed
    }
    return this.setExpanded(id, true) || changed
  }

  private collapse(id: NodeId) {
    const node = this.arena.get(id)
    if (node.parent === null || node.kind !== 'directory' || !node.expanded) {
      return false
    }
    node.expanded = false
    // closed directories keep no opened descendants
    for (const descendant of this.arena.descendants(id)) {
      this.setExpanded(descendant, false)
    }
    return true
  }

  private collapseAll() {
    let changed = false
    for (const id of this.arena.ids()) {
      if (!this.arena.isRoot(id)) {
        changed = this.setExpanded(id, false) || changed
      }
    }
    return changed
  }
}
