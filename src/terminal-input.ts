import { fromEvent, from, merge } from 'rxjs'
import { debounceTime, map, mergeMap, scan, share } from 'rxjs/operators'
import type { Observable } from 'rxjs'
import type { InputEvent, KeyAction } from './types'

const ESC = '\x1b'
// xterm SGR (1006) mouse report: ESC [ < button ; column ; row M|m
const sgrMouseRegExp = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/
// any other CSI sequence: parameters, intermediates, one final byte
const csiRegExp = /^\x1b\[[0-?]*[ -/]*[@-~]/
const ss3RegExp = /^\x1bO[A-Za-z]/
// what a sequence looks like before its final byte has arrived
const partialSequenceRegExp = /^\x1b(?:O|\[[0-?]*[ -/]*)?$/

/**
 * How long a lone ESC waits for the rest of a sequence before it counts as
 * the escape key
 */
export const ESCAPE_TIMEOUT_MS = 50

const CURSOR_KEYS: Record<string, string> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
}

const keyActionMap: Record<string, KeyAction> = {
  up: 'grow',
  down: 'shrink',
  e: 'expand',
  a: 'expand-path',
  c: 'collapse',
  x: 'collapse-all',
  q: 'quit',
  escape: 'quit',
  'ctrl-c': 'quit',
}

export const ENABLE_MOUSE = `${ESC}[?1000h${ESC}[?1006h`
export const DISABLE_MOUSE = `${ESC}[?1006l${ESC}[?1000l`

export interface DecodedInput {
  events: InputEvent[]
  /**
   * unfinished escape sequence at the end of the input, to be completed by
   * the next chunk
   */
  pending: string
}

/**
 * Decodes as much of `buffer` as forms whole events. A trailing escape
 * sequence that may still be cut short is handed back as `pending`.
 */
export function decodeInputBuffer(buffer: string): DecodedInput {
  const events: InputEvent[] = []
  let rest = buffer
  while (rest.length > 0) {
    if (partialSequenceRegExp.test(rest)) {
      return { events, pending: rest }
    }

    const mouse = sgrMouseRegExp.exec(rest)
    if (mouse) {
      const [sequence, button, column, row, kind] = mouse
      if (Number(button) === 0 && kind === 'M') {
        events.push({ type: 'click', x: Number(column) - 1, y: Number(row) - 1 })
      }
      rest = rest.slice(sequence.length)
      continue
    }

    const csi = csiRegExp.exec(rest) ?? ss3RegExp.exec(rest)
    if (csi) {
      const name = CURSOR_KEYS[csi[0].slice(-1)]
      if (name && csi[0].length === 3) {
        events.push({ type: 'key', name })
      }
      rest = rest.slice(csi[0].length)
      continue
    }

    const [char] = rest
    rest = rest.slice(char.length)
    events.push(...decodeChar(char))
  }
  return { events, pending: '' }
}

function decodeChar(char: string): InputEvent[] {
  if (char === ESC) return [{ type: 'key', name: 'escape' }]
  if (char === '\x03') return [{ type: 'key', name: 'ctrl-c' }]
  if (char === '\r' || char === '\n') return [{ type: 'key', name: 'return' }]
  if (char >= ' ' && char !== '\x7f') return [{ type: 'key', name: char.toLowerCase() }]
  return []
}

/**
 * Decodes a complete chunk. An unfinished sequence at its end is read
 * character by character, so a lone ESC is the escape key.
 */
export function decodeInput(chunk: string): InputEvent[] {
  const { events, pending } = decodeInputBuffer(chunk)
  if (pending.length === 0) {
    return events
  }
  const [head] = pending
  return [...events, ...decodeChar(head), ...decodeInput(pending.slice(head.length))]
}

export function resolveKeyAction(name: string): KeyAction | null {
  return Object.prototype.hasOwnProperty.call(keyActionMap, name)
    ? keyActionMap[name]
    : null
}

/**
 * Decoded events from the stream's `data` events. A sequence split across
 * reads is put back together; what is still unfinished after
 * `escapeTimeout` ms without input is decoded as typed keys.
 */
export function createInputStream(
  input: NodeJS.ReadableStream,
  escapeTimeout = ESCAPE_TIMEOUT_MS
): Observable<InputEvent> {
  const chunk$ = fromEvent(input, 'data').pipe(
    map((chunk) => String(chunk)),
    share()
  )
  const timeout$ = chunk$.pipe(
    debounceTime(escapeTimeout),
    map(() => null)
  )
  return merge(chunk$, timeout$).pipe(
    scan(
      (state: DecodedInput, chunk: string | null): DecodedInput =>
        chunk === null
          ? { events: decodeInput(state.pending), pending: '' }
          : decodeInputBuffer(state.pending + chunk),
      { events: [], pending: '' }
    ),
    mergeMap((state) => from(state.events)),
    share()
  )
}
