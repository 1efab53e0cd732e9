import path from 'node:path'
import fs from 'node:fs'
import chalk from 'chalk'
import figures from 'figures'
import { formatBytes } from './utils'
import type { Context, ScanIssue, ScanResult } from './types'

const MAX_ISSUE_LINES = 20

export function getLocalVersion() {
  const packageJSONPath = path.join(__dirname, '..', 'package.json')
  if (!fs.existsSync(packageJSONPath)) {
    return '0.0.0'
  }
  const packageJSON: unknown = JSON.parse(fs.readFileSync(packageJSONPath, 'utf8'))
  if (
    typeof packageJSON === 'object' &&
    packageJSON !== null &&
    'version' in packageJSON &&
    typeof packageJSON.version === 'string'
  ) {
    return packageJSON.version
  }
  return '0.0.0'
}

export function showAppHeader(localVersion = getLocalVersion()) {
  console.log(
    `\n${chalk.bold.blue(`
 _                         _
| |_ ___ _ __ _ __ ___    | |_ _ __ ___  ___ _ __ ___   __ _ _ __
| __/ _ \\ '__| '_ \` _ \\   | __| '__/ _ \\/ _ \\ '_ \` _ \\ / _\` | '_ \\
| ||  __/ |  | | | | | |  | |_| | |  __/  __/ | | | | | (_| | |_) |
 \\__\\___|_|  |_| |_| |_|   \\__|_|  \\___|\\___|_| |_| |_|\\__,_| .__/
                                                            |_|    ${chalk.cyanBright(
      `[version: v${localVersion}]`
    )}
  `)}`
  )
}
export function showScanPathInfo({ root, options }: Context) {
  const ignored =
    options.ignore.length > 0
      ? `\n  ${chalk.bold.gray(`ignoring: ${options.ignore.join(', ')}`)}`
      : ''
  console.log(
    `\n$ ${chalk.yellowBright(root)}\n  ${chalk.bold.gray(
      'scanning directory tree ...'
    )}${ignored}\n`
  )
}
export function describeScanResult(result: ScanResult) {
  const root = result.arena.get(result.arena.rootId)
  return `${result.fileCount} files, ${result.directoryCount} directories, ${formatBytes(
    root.size
  )}`
}
export function showScanIssues(issues: ScanIssue[]) {
  if (issues.length === 0) return
  console.log(
    `\n${chalk.yellow(
      `${figures.warning} ${issues.length} entries could not be read:`
    )}`
  )
  issues.slice(0, MAX_ISSUE_LINES).forEach((issue) => {
    console.log(`  ${chalk.red(issue.code)} ${chalk.white(issue.path)}`)
  })
  if (issues.length > MAX_ISSUE_LINES) {
    console.log(chalk.gray(`  ... and ${issues.length - MAX_ISSUE_LINES} more`))
  }
  console.log()
}
