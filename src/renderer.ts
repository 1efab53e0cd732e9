import chalk from 'chalk'
import figures from 'figures'
import stringWidth from 'string-width'
import { SELECTION_COLOR, nodeColor, shade } from './colors'
import { formatBytes, formatPercent, truncate } from './utils'
import type { TreeArena } from './tree-arena'
import type { ColorBy, LayoutMap, NodeId, Rect, Rgb } from './types'

export interface Cell {
  /**
   * empty for the column covered by a wide character to its left
   */
  char: string
  fg: Rgb | null
  bg: Rgb | null
  bold: boolean
}
export interface Frame {
  width: number
  height: number
  cells: Cell[][]
}
export interface FrameInput {
  arena: TreeArena
  layout: LayoutMap
  visible: NodeId[]
  selected: NodeId | null
  width: number
  height: number
  colorBy: ColorBy
}
interface BoxChars {
  topLeft: string
  topRight: string
  bottomLeft: string
  bottomRight: string
  horizontal: string
  vertical: string
}

export const STATUS_ROWS = 2
export const THIN_BOX: BoxChars = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
}
export const DOUBLE_BOX: BoxChars = {
  topLeft: '╔',
  topRight: '╗',
  bottomLeft: '╚',
  bottomRight: '╝',
  horizontal: '═',
  vertical: '║',
}
export const NARROW_SELECTION_CHAR = '▒'

export function createFrame(width: number, height: number): Frame {
  const cells = Array.from({ length: Math.max(0, height) }, () =>
    Array.from(
      { length: Math.max(0, width) },
      (): Cell => ({ char: ' ', fg: null, bg: null, bold: false })
    )
  )
  return { width: Math.max(0, width), height: Math.max(0, height), cells }
}

function setCell(frame: Frame, x: number, y: number, patch: Partial<Cell>) {
  if (x < 0 || y < 0 || x >= frame.width || y >= frame.height) return
  const row = frame.cells[y]
  row[x] = { ...row[x], ...patch }
}

function fillRect(frame: Frame, rect: Rect, bg: Rgb) {
  for (let y = rect.y; y < rect.y + rect.height; y++) {
    for (let x = rect.x; x < rect.x + rect.width; x++) {
      setCell(frame, x, y, { char: ' ', bg, fg: null, bold: false })
    }
  }
}

function drawBox(
  frame: Frame,
  rect: Rect,
  chars: BoxChars,
  fg: Rgb,
  bold: boolean
) {
  const right = rect.x + rect.width - 1
  const bottom = rect.y + rect.height - 1
  for (let x = rect.x + 1; x < right; x++) {
    setCell(frame, x, rect.y, { char: chars.horizontal, fg, bold })
    setCell(frame, x, bottom, { char: chars.horizontal, fg, bold })
  }
  for (let y = rect.y + 1; y < bottom; y++) {
    setCell(frame, rect.x, y, { char: chars.vertical, fg, bold })
    setCell(frame, right, y, { char: chars.vertical, fg, bold })
  }
  setCell(frame, rect.x, rect.y, { char: chars.topLeft, fg, bold })
  setCell(frame, right, rect.y, { char: chars.topRight, fg, bold })
  setCell(frame, rect.x, bottom, { char: chars.bottomLeft, fg, bold })
  setCell(frame, right, bottom, { char: chars.bottomRight, fg, bold })
}

function writeLabel(
  frame: Frame,
  rect: Rect,
  label: string,
  fg: Rgb,
  bold: boolean
) {
  if (rect.width < 3) return
  let x = rect.x + 1
  for (const char of truncate(label, rect.width - 2)) {
    const width = stringWidth(char)
    if (width === 0) continue
    setCell(frame, x, rect.y, { char, fg, bold })
    // the second column of a wide character prints nothing of its own
    if (width === 2) setCell(frame, x + 1, rect.y, { char: '', fg, bold })
    x += width
  }
}

function hasBorder(rect: Rect) {
  return rect.width >= 2 && rect.height >= 2
}

/**
 * Paints the visible blocks. Reads the tree, never changes it.
 */
export function renderFrame(input: FrameInput): Frame {
  const { arena, layout, visible, selected, colorBy } = input
  const frame = createFrame(input.width, input.height)

  for (const id of visible) {
    const rect = layout.get(id)
    if (!rect) continue
    const bg = nodeColor(arena, id, colorBy)
    fillRect(frame, rect, bg)
    if (hasBorder(rect)) {
      const borderColor = shade(bg, 0.6)
      drawBox(frame, rect, THIN_BOX, borderColor, false)
      writeLabel(frame, rect, arena.get(id).name, shade(bg, 1.8), false)
    }
  }

  const selectedRect =
    selected !== null && visible.includes(selected) ? layout.get(selected) : undefined
  if (selected !== null && selectedRect) {
    if (hasBorder(selectedRect)) {
      drawBox(frame, selectedRect, DOUBLE_BOX, SELECTION_COLOR, true)
      writeLabel(frame, selectedRect, arena.get(selected).name, SELECTION_COLOR, true)
    } else {
      for (let y = selectedRect.y; y < selectedRect.y + selectedRect.height; y++) {
        for (let x = selectedRect.x; x < selectedRect.x + selectedRect.width; x++) {
          setCell(frame, x, y, {
            char: NARROW_SELECTION_CHAR,
            fg: SELECTION_COLOR,
            bold: true,
          })
        }
      }
    }
  }
  return frame
}

export function keyLegend() {
  return `${figures.arrowUp}/${figures.arrowDown} resize  E expand  A expand path  C collapse  X collapse all  Q quit`
}

export function renderStatusLines(
  arena: TreeArena,
  selected: NodeId | null,
  width: number,
  issueCount = 0
): string[] {
  let selection = 'Click a block to select it'
  if (selected !== null) {
    const node = arena.get(selected)
    selection = `${arena.getPathString(selected)}  ${formatBytes(node.size)}`
    if (node.visualWeight !== null) {
      selection += `  visual ${formatPercent(arena.visualShare(selected))}`
    }
    if (node.error !== undefined) {
      selection += `  [${node.error}]`
    }
  }
  const legend =
    issueCount > 0
      ? `${keyLegend()}  ${figures.warning} ${issueCount} inaccessible`
      : keyLegend()
  return [truncate(selection, width), truncate(legend, width)]
}

function sameStyle(a: Cell, b: Cell) {
  return (
    a.bold === b.bold &&
    String(a.fg) === String(b.fg) &&
    String(a.bg) === String(b.bg)
  )
}

function styleOf(cell: Cell, painter: chalk.Chalk) {
  let style = painter
  if (cell.bg) style = style.bgRgb(...cell.bg)
  if (cell.fg) style = style.rgb(...cell.fg)
  if (cell.bold) style = style.bold
  return style
}

/**
 * Serializes the frame into one string per row. Runs of cells sharing a
 * style are painted with a single chalk call.
 */
export function frameToLines(frame: Frame, painter: chalk.Chalk = chalk): string[] {
  return frame.cells.map((row) => {
    let line = ''
    let runStart = 0
    for (let x = 1; x <= row.length; x++) {
      if (x === row.length || !sameStyle(row[x], row[runStart])) {
        const text = row
          .slice(runStart, x)
          .map((cell) => cell.char)
          .join('')
        line += styleOf(row[runStart], painter)(text)
        runStart = x
      }
    }
    return line
  })
}
