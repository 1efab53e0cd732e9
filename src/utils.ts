import path from 'node:path'
import stringWidth from 'string-width'

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB']

export function getTargetDir(dirArg?: string, cwd = process.cwd()): string {
  if (!dirArg) {
    return cwd
  }
  return path.isAbsolute(dirArg) ? path.normalize(dirArg) : path.join(cwd, dirArg)
}

export function formatBytes(bytes: number) {
  let value = bytes
  let unitIndex = 0
  while (value >= 1024 && unitIndex < BYTE_UNITS.length - 1) {
    value /= 1024
    unitIndex++
  }
  const digits = unitIndex === 0 || value >= 100 ? 0 : 1
  return `${value.toFixed(digits)} ${BYTE_UNITS[unitIndex]}`
}

export function formatPercent(ratio: number) {
  return `${(ratio * 100).toFixed(1)}%`
}

/**
 * Cuts `text` down to `width` terminal columns, marking the cut with an
 * ellipsis. Wide characters take two columns.
 */
export function truncate(text: string, width: number) {
  if (width <= 0) return ''
  if (stringWidth(text) <= width) return text
  let kept = ''
  let used = 0
  for (const char of text) {
    const charWidth = stringWidth(char)
    if (used + charWidth > width - 1) break
    kept += char
    used += charWidth
  }
  return `${kept}…`
}
