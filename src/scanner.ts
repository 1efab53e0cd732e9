import path from 'node:path'
import fs from 'node:fs'
import { setImmediate as nextTurn } from 'node:timers/promises'
import { TreeArena } from './tree-arena'
import { ScanError, getErrorCode, getErrorMessage } from './errors'
import type { NodeId, ScanIssue, ScanResult } from './types'

export interface ScanStats {
  size: number
  isDirectory(): boolean
  isSymbolicLink(): boolean
}
export interface ScanFileSystem {
  lstatSync(target: string): ScanStats
  readdirSync(target: string): string[]
}
export interface ScanOptions {
  ignore?: string[]
  fs?: ScanFileSystem
}

const nodeFileSystem: ScanFileSystem = {
  lstatSync: (target) => fs.lstatSync(target),
  readdirSync: (target) => fs.readdirSync(target),
}

/**
 * How long the async scan may hold the event loop before it lets timers
 * (the spinner) run
 */
const YIELD_INTERVAL_MS = 50

function byName(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Walks the tree, pausing after each directory it reads. Both scan entry
 * points drive this walk, one straight through, one giving the event loop a
 * turn now and then.
 */
function* walkTree(
  rootPath: string,
  options: ScanOptions
): Generator<void, ScanResult, undefined> {
  const fileSystem = options.fs ?? nodeFileSystem
  const ignored = new Set(options.ignore ?? [])
  const rootAbsPath = path.resolve(rootPath)
  const arena = new TreeArena()
  const issues: ScanIssue[] = []
  let fileCount = 0
  let directoryCount = 0

  const report = (entryPath: string, err: unknown) => {
    const issue = {
      path: entryPath,
      code: getErrorCode(err),
      message: getErrorMessage(err),
    }
    issues.push(issue)
    return issue
  }

  // Returns the size of the subtree so parents can sum it up
  function* scanDirectory(
    dirId: NodeId,
    dirPath: string
  ): Generator<void, number, undefined> {
    let names: string[]
    try {
      names = fileSystem.readdirSync(dirPath)
    } catch (err) {
      // maybe permission denied, keep the directory as an empty block
      arena.get(dirId).error = report(dirPath, err).code
      return 0
    }

    let total = 0
    for (const name of [...names].sort(byName)) {
      if (ignored.has(name)) continue
      const entryPath = path.join(dirPath, name)
      let stats: ScanStats
      try {
        stats = fileSystem.lstatSync(entryPath)
      } catch (err) {
        arena.add(
          {
            name,
            path: entryPath,
            kind: 'file',
            size: 0,
            error: report(entryPath, err).code,
          },
          dirId
        )
        fileCount++
        continue
      }

      if (stats.isDirectory() && !stats.isSymbolicLink()) {
        const childId = arena.add(
          { name, path: entryPath, kind: 'directory' },
          dirId
        )
        directoryCount++
        total += yield* scanDirectory(childId, entryPath)
      } else {
        arena.add(
          { name, path: entryPath, kind: 'file', size: stats.size },
          dirId
        )
        fileCount++
        total += stats.size
      }
    }
    arena.get(dirId).size = total
    yield
    return total
  }

  let rootStats: ScanStats
  try {
    rootStats = fileSystem.lstatSync(rootAbsPath)
  } catch (err) {
    const code = getErrorCode(err)
    throw new ScanError(
      code === 'ENOENT'
        ? `'${rootAbsPath}' does not exist.`
        : `Can't read '${rootAbsPath}' (${code}).`,
      rootAbsPath,
      code
    )
  }

  const rootName = path.basename(rootAbsPath) || rootAbsPath
  if (rootStats.isDirectory()) {
    const rootId = arena.add({
      name: rootName,
      path: rootAbsPath,
      kind: 'directory',
    })
    directoryCount++
    yield* scanDirectory(rootId, rootAbsPath)
  } else {
    arena.add({
      name: rootName,
      path: rootAbsPath,
      kind: 'file',
      size: rootStats.size,
    })
    fileCount++
  }

  return { arena, issues, fileCount, directoryCount }
}

export function scanTree(rootPath: string, options: ScanOptions = {}): ScanResult {
  const walk = walkTree(rootPath, options)
  let step = walk.next()
  while (!step.done) {
    step = walk.next()
  }
  return step.value
}

/**
 * Same result as `scanTree`, but lets the event loop run every
 * `YIELD_INTERVAL_MS` so a spinner keeps turning during long scans.
 */
export async function scanTreeAsync(
  rootPath: string,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const walk = walkTree(rootPath, options)
  let lastYield = Date.now()
  let step = walk.next()
  while (!step.done) {
    if (Date.now() - lastYield >= YIELD_INTERVAL_MS) {
      await nextTurn()
      lastYield = Date.now()
    }
    step = walk.next()
  }
  return step.value
}
