import chalk from 'chalk'
import figures from 'figures'
import stringWidth from 'string-width'
import { computeLayout } from '../layout'
import { SELECTION_COLOR, nodeColor, shade } from '../colors'
import {
  NARROW_SELECTION_CHAR,
  frameToLines,
  keyLegend,
  renderFrame,
  renderStatusLines,
} from '../renderer'
import { buildArena } from './helpers/arena'
import type { NodeId } from '../types'

const plain = new chalk.Instance({ level: 0 })

function twoFiles() {
  const arena = buildArena('/p', { 'a.txt': 100, 'b.txt': 300 })
  const layout = computeLayout(arena, { x: 0, y: 0, width: 16, height: 4 })
  return { arena, layout }
}

function frameFor(selected: NodeId | null) {
  const { arena, layout } = twoFiles()
  return renderFrame({
    arena,
    layout,
    visible: arena.visibleNodes(),
    selected,
    width: 16,
    height: 4,
    colorBy: 'path',
  })
}

describe('renderFrame', () => {
  it('fills each block and outlines it', () => {
    const { arena } = twoFiles()
    const frame = frameFor(null)
    const fill = nodeColor(arena, 1, 'path')

    expect(frame.width).toBe(16)
    expect(frame.height).toBe(4)
    expect(frame.cells[0][0]).toEqual({ char: '┌', fg: shade(fill, 0.6), bg: fill, bold: false })
    expect(frame.cells[1][1]).toEqual({ char: ' ', fg: null, bg: fill, bold: false })
    expect(frame.cells[3][3].char).toBe('┘')
    expect(frame.cells[1][4].bg).toEqual(nodeColor(arena, 2, 'path'))
  })

  it('writes names into the top border', () => {
    expect(frameToLines(frameFor(null), plain)).toEqual([
      '┌a…┐┌b.txt─────┐',
      '│  ││          │',
      '│  ││          │',
      '└──┘└──────────┘',
    ])
  })

  it('highlights the selected block', () => {
    const frame = frameFor(2)
    expect(frameToLines(frame, plain)).toEqual([
      '┌a…┐╔b.txt═════╗',
      '│  │║          ║',
      '│  │║          ║',
      '└──┘╚══════════╝',
    ])
    expect(frame.cells[0][4]).toMatchObject({ fg: SELECTION_COLOR, bold: true })
    expect(frame.cells[0][0].bold).toBe(false)
  })

  it('does not highlight a selection that is not visible', () => {
    const arena = buildArena('/p', { d: { 'x.txt': 5 }, 'y.txt': 5 })
    const layout = computeLayout(arena, { x: 0, y: 0, width: 10, height: 3 })
    const frame = renderFrame({
      arena,
      layout,
      visible: arena.visibleNodes(),
      selected: 2,
      width: 10,
      height: 3,
      colorBy: 'depth',
    })
    expect(frameToLines(frame, plain)[0]).toBe('┌d──┐┌y.…┐')
  })

  it('shades blocks too small for a border', () => {
    const arena = buildArena('/p', { a: 500, b: 500 })
    const layout = computeLayout(arena, { x: 0, y: 0, width: 10, height: 1 })
    const frame = renderFrame({
      arena,
      layout,
      visible: arena.visibleNodes(),
      selected: 1,
      width: 10,
      height: 1,
      colorBy: 'kind',
    })
    expect(frameToLines(frame, plain)).toEqual([
      `${NARROW_SELECTION_CHAR.repeat(5)}     `,
    ])
  })

  it('keeps wide character names inside their block', () => {
    const name = '日本語のファイル名.txt'
    const render = (width: number) => {
      const arena = buildArena('/p', { [name]: 10 })
      const layout = computeLayout(arena, { x: 0, y: 0, width, height: 3 })
      const frame = renderFrame({
        arena,
        layout,
        visible: arena.visibleNodes(),
        selected: null,
        width,
        height: 3,
        colorBy: 'path',
      })
      return frameToLines(frame, plain)
    }

    const wide = render(30)
    expect(wide[0]).toBe(`┌${name}──────┐`)
    expect(wide.map((line) => stringWidth(line))).toEqual([30, 30, 30])

    const narrow = render(12)
    expect(narrow[0]).toBe('┌日本語の…─┐')
    expect(narrow.map((line) => stringWidth(line))).toEqual([12, 12, 12])
  })

  it('leaves the tree untouched', () => {
    const { arena, layout } = twoFiles()
    const before = JSON.stringify(arena.ids().map((id) => arena.get(id)))
    renderFrame({
      arena,
      layout,
      visible: arena.visibleNodes(),
      selected: 1,
      width: 16,
      height: 4,
      colorBy: 'path',
    })
    expect(JSON.stringify(arena.ids().map((id) => arena.get(id)))).toBe(before)
  })
})

describe('renderStatusLines', () => {
  it('asks for a click when nothing is selected', () => {
    const { arena } = twoFiles()
    expect(renderStatusLines(arena, null, 200)).toEqual([
      'Click a block to select it',
      keyLegend(),
    ])
  })

  it('shows path and size of the selection', () => {
    const { arena } = twoFiles()
    expect(renderStatusLines(arena, 1, 200)[0]).toBe('/p/a.txt (file)  100 B')
    expect(renderStatusLines(arena, 0, 200)[0]).toBe('/p (folder)  400 B')
  })

  it('shows the visual share once the weight was adjusted', () => {
    const { arena } = twoFiles()
    arena.get(1).visualWeight = 300
    expect(renderStatusLines(arena, 1, 200)[0]).toBe('/p/a.txt (file)  100 B  visual 50.0%')
  })

  it('marks inaccessible entries', () => {
    const { arena } = twoFiles()
    arena.get(2).error = 'EACCES'
    expect(renderStatusLines(arena, 2, 200, 3)).toEqual([
      '/p/b.txt (file)  300 B  [EACCES]',
      `${keyLegend()}  ${figures.warning} 3 inaccessible`,
    ])
  })

  it('fits the lines into the width', () => {
    const { arena } = twoFiles()
    const [selection, legend] = renderStatusLines(arena, null, 10)
    expect(selection).toBe('Click a b…')
    expect([...legend].length).toBe(10)
  })
})
