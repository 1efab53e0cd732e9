import cliCursor from 'cli-cursor'
import { Subject, fromEvent } from 'rxjs'
import { takeUntil } from 'rxjs/operators'
import { DISABLE_MOUSE, ENABLE_MOUSE, createInputStream, resolveKeyAction } from './terminal-input'
import { STATUS_ROWS, frameToLines, renderFrame, renderStatusLines } from './renderer'
import type { TreemapSession } from './interaction'
import type { ColorBy, InputEvent } from './types'

const ALT_SCREEN_ON = '\x1b[?1049h'
const ALT_SCREEN_OFF = '\x1b[?1049l'
const CURSOR_HOME = '\x1b[H'
const CLEAR_SCREEN = '\x1b[2J'

export interface ViewInput extends NodeJS.ReadableStream {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
}
export interface ViewOutput extends NodeJS.WritableStream {
  columns?: number
  rows?: number
}
export interface TreemapViewOptions {
  input: ViewInput
  output: ViewOutput
  colorBy: ColorBy
  /**
   * enable xterm mouse reporting. Default: true
   */
  mouse?: boolean
  /**
   * entries that could not be read, shown in the status area
   */
  issueCount?: number
}

/**
 * Paints the full frame plus the status rows for the current session state.
 */
export function renderScreen(
  session: TreemapSession,
  size: { columns: number; rows: number },
  colorBy: ColorBy,
  issueCount = 0
): string[] {
  const treemapRows = Math.max(0, size.rows - STATUS_ROWS)
  const frame = renderFrame({
    arena: session.arena,
    layout: session.layout,
    visible: session.visible,
    selected: session.selected,
    width: size.columns,
    height: treemapRows,
    colorBy,
  })
  return [
    ...frameToLines(frame),
    ...renderStatusLines(session.arena, session.selected, size.columns, issueCount),
  ]
}

export class TreemapView {
  private readonly quit$ = new Subject<void>()
  private readonly options: Required<TreemapViewOptions>

  constructor(private readonly session: TreemapSession, options: TreemapViewOptions) {
    this.options = {
      mouse: true,
      issueCount: 0,
      ...options,
    }
  }

  private get screenSize() {
    const { columns = 80, rows = 24 } = this.options.output
    return { columns, rows }
  }

  run(): Promise<void> {
    const { input, output, mouse } = this.options
    return new Promise<void>((resolve) => {
      output.write(ALT_SCREEN_ON + CLEAR_SCREEN)
      cliCursor.hide(output)
      if (mouse) output.write(ENABLE_MOUSE)
      if (input.isTTY && input.setRawMode) input.setRawMode(true)
      input.resume()

      createInputStream(input)
        .pipe(takeUntil(this.quit$))
        .subscribe((event) => this.onInput(event))
      fromEvent(output, 'resize')
        .pipe(takeUntil(this.quit$))
        .subscribe(() => this.resize())
      this.quit$.subscribe({
        complete: () => {
          this.restore()
          resolve()
        },
      })

      this.resize()
    })
  }

  private resize() {
    const { columns, rows } = this.screenSize
    this.session.resize({
      x: 0,
      y: 0,
      width: columns,
      height: Math.max(0, rows - STATUS_ROWS),
    })
    this.options.output.write(CLEAR_SCREEN)
    this.render()
  }

  render() {
    const { output, colorBy, issueCount } = this.options
    const lines = renderScreen(this.session, this.screenSize, colorBy, issueCount)
    output.write(CURSOR_HOME + lines.join('\n'))
  }

  private onInput(event: InputEvent) {
    if (event.type === 'click') {
      if (this.session.click({ x: event.x, y: event.y })) this.render()
      return
    }
    const action = resolveKeyAction(event.name)
    if (action === null) return
    if (action === 'quit') {
      this.close()
      return
    }
    if (this.session.dispatch(action)) this.render()
  }

  close() {
    this.quit$.next()
    this.quit$.complete()
  }

  private restore() {
    const { input, output, mouse } = this.options
    if (mouse) output.write(DISABLE_MOUSE)
    if (input.isTTY && input.setRawMode) input.setRawMode(false)
    input.pause()
    cliCursor.show(output)
    output.write(ALT_SCREEN_OFF)
  }
}
