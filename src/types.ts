import type { TreeArena } from './tree-arena'

export type NodeId = number
export type NodeKind = 'file' | 'directory'
export interface TreeNode {
  id: NodeId
  name: string
  path: string
  kind: NodeKind
  size: number
  parent: NodeId | null
  children: NodeId[]
  expanded: boolean
  /**
   * Display-only weight, `null` while the node is sized by its actual bytes
   */
  visualWeight: number | null
  /**
   * Set when the entry could not be read during the scan
   */
  error?: string
}
export interface Rect {
  x: number
  y: number
  width: number
  height: number
}
export interface Point {
  x: number
  y: number
}
export type LayoutMap = Map<NodeId, Rect>
export interface ScanIssue {
  path: string
  code: string
  message: string
}
export interface ScanResult {
  arena: TreeArena
  issues: ScanIssue[]
  fileCount: number
  directoryCount: number
}
export type ColorBy = 'path' | 'depth' | 'kind'
export type Rgb = [number, number, number]
export interface OptionContext {
  ignore: string[]
  step: number
  colorBy: ColorBy
  cellAspect: number
  mouse: boolean
}
export type Command =
  | 'grow'
  | 'shrink'
  | 'expand'
  | 'expand-path'
  | 'collapse'
  | 'collapse-all'
export type KeyAction = Command | 'quit'
export type InputEvent =
  | { type: 'click'; x: number; y: number }
  | { type: 'key'; name: string }
export interface Context {
  root: string
  options: OptionContext
}
