#!/usr/bin/env node
import cac from 'cac'
import chalk from 'chalk'
import ora from 'ora'
import ensureNodeVersion from './check-node-version'
import {
  describeScanResult,
  getLocalVersion,
  showAppHeader,
  showScanIssues,
  showScanPathInfo,
} from './show-console-print'
import { getCliOptionsContext, setupCliOptions } from './setup-cli-options'
import { loadConfig } from './load-config'
import { scanTreeAsync } from './scanner'
import { TreemapSession } from './interaction'
import { TreemapView, renderScreen } from './treemap-view'
import { getTargetDir } from './utils'
import type { Context, ScanResult } from './types'

const scanSpinner = ora(chalk.yellow('Scanning ...'))

async function scanWithSpinner({ root, options }: Context): Promise<ScanResult> {
  scanSpinner.start()
  try {
    const result = await scanTreeAsync(root, { ignore: options.ignore })
    scanSpinner.succeed(chalk.yellow(`Scanned ${describeScanResult(result)}.`))
    return result
  } catch (err) {
    scanSpinner.fail(chalk.yellow('Scanning failed.'))
    throw err
  }
}

async function showTreemap(ctx: Context, result: ScanResult) {
  const { options } = ctx
  const session = new TreemapSession(result.arena, {
    step: options.step,
    cellAspect: options.cellAspect,
  })

  // Without a terminal on both ends there is nothing to interact with,
  // print a single frame instead
  if (!process.stdout.isTTY || !process.stdin.isTTY) {
    const columns = process.stdout.columns || 80
    const rows = process.stdout.rows || 24
    session.resize({ x: 0, y: 0, width: columns, height: rows - 2 })
    console.log(
      renderScreen(session, { columns, rows }, options.colorBy, result.issues.length).join('\n')
    )
    return
  }

  const view = new TreemapView(session, {
    input: process.stdin,
    output: process.stdout,
    colorBy: options.colorBy,
    mouse: options.mouse,
    issueCount: result.issues.length,
  })
  await view.run()
}

async function main() {
  ensureNodeVersion()
  const cli = setupCliOptions(cac('term-treemap'))
  cli.help()
  cli.version(getLocalVersion())

  const parsedEnvArgs = cli.parse()
  if (parsedEnvArgs.options.help || parsedEnvArgs.options.version) {
    return
  }
  showAppHeader()

  const configArg: unknown = parsedEnvArgs.options.config
  const fileOptions = loadConfig(typeof configArg === 'string' ? configArg : undefined)
  const ctx: Context = {
    root: getTargetDir(parsedEnvArgs.args[0]),
    options: getCliOptionsContext(parsedEnvArgs.options, fileOptions),
  }
  showScanPathInfo(ctx)

  const result = await scanWithSpinner(ctx)
  if (!result.arena.isDirectory(result.arena.rootId)) {
    throw new Error("Can't run term-treemap on a single file.")
  }

  await showTreemap(ctx, result)
  showScanIssues(result.issues)
}

main().then(
  () => {
    process.exitCode = 0
  },
  (err: unknown) => {
    console.log(chalk.red(`\n${err}`))
    process.exitCode = 1
  }
)
