import path from 'node:path'
import type { TreeArena } from './tree-arena'
import type { ColorBy, NodeId, Rgb } from './types'

export const DIRECTORY_COLOR: Rgb = [70, 110, 170]
export const INACCESSIBLE_COLOR: Rgb = [90, 90, 90]
export const SELECTION_COLOR: Rgb = [255, 255, 255]
export const DEPTH_PALETTE: Rgb[] = [
  [200, 85, 61],
  [224, 159, 62],
  [120, 170, 80],
  [58, 150, 160],
  [90, 110, 200],
  [160, 90, 180],
]

// FNV-1a, 32 bits
export function hashString(value: string) {
  let hash = 0x811c9dc5
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193)
  }
  return hash >>> 0
}

export function hslToRgb(hue: number, saturation: number, lightness: number): Rgb {
  const h = (((hue % 360) + 360) % 360) / 60
  const chroma = (1 - Math.abs(2 * lightness - 1)) * saturation
  const x = chroma * (1 - Math.abs((h % 2) - 1))
  const m = lightness - chroma / 2
  const [r, g, b] =
    h < 1
      ? [chroma, x, 0]
      : h < 2
      ? [x, chroma, 0]
      : h < 3
      ? [0, chroma, x]
      : h < 4
      ? [0, x, chroma]
      : h < 5
      ? [x, 0, chroma]
      : [chroma, 0, x]
  return [
    Math.round((r + m) * 255),
    Math.round((g + m) * 255),
    Math.round((b + m) * 255),
  ]
}

export function shade([r, g, b]: Rgb, factor: number): Rgb {
  const clamp = (value: number) =>
    Math.min(255, Math.max(0, Math.round(value * factor)))
  return [clamp(r), clamp(g), clamp(b)]
}

function hashedColor(key: string): Rgb {
  return hslToRgb(hashString(key) % 360, 0.55, 0.45)
}

export function nodeColor(arena: TreeArena, id: NodeId, colorBy: ColorBy): Rgb {
  const node = arena.get(id)
  if (node.error !== undefined) {
    return INACCESSIBLE_COLOR
  }
  switch (colorBy) {
    case 'depth':
      return DEPTH_PALETTE[(arena.depth(id) - 1 + DEPTH_PALETTE.length) % DEPTH_PALETTE.length]
    case 'kind':
      return node.kind === 'directory'
        ? DIRECTORY_COLOR
        : hashedColor(path.extname(node.name).toLowerCase() || node.name)
    case 'path':
      return hashedColor(node.path)
  }
}
