import { ConfigError } from './errors'
import { DEFAULT_STEP } from './interaction'
import { DEFAULT_CELL_ASPECT } from './layout'
import { COLOR_MODES, isColorBy, isValidAspect, isValidStep } from './load-config'
import type { OptionContext } from './types'
import type { CAC } from 'cac'

const optionsDefMap: Record<keyof OptionContext, string[]> = {
  ignore: ['ignore'],
  step: ['step'],
  colorBy: ['colorBy', 'color-by'],
  cellAspect: ['aspect'],
  mouse: ['mouse'],
}
export const createDefaultOptionsContext = (): OptionContext => {
  return {
    ignore: [],
    step: DEFAULT_STEP,
    colorBy: 'path',
    cellAspect: DEFAULT_CELL_ASPECT,
    mouse: true,
  }
}

export function setupCliOptions(cli: CAC) {
  cli
    .command('[root]', 'Show a directory tree as an interactive treemap')
    .option('-c, --config <path>', 'Config file (default: ./.treemaprc.json)')
    .option('--ignore <name>', 'Skip entries with this name (repeatable)', {
      type: [String],
    })
    .option('--step <ratio>', `Visual resize step per key press (default: ${DEFAULT_STEP})`)
    .option('--color-by <mode>', `Block colors: ${COLOR_MODES.join(' | ')}`)
    .option('--aspect <ratio>', 'Height/width ratio of a terminal cell')
    .option('--no-mouse', 'Disable mouse reporting')
  return cli
}

function toList(value: unknown): string[] {
  const values = Array.isArray(value) ? value : [value]
  return values.filter((item) => item !== undefined && item !== '').map(String)
}

/**
 * Merges defaults, the config file and command line flags, in that order.
 */
export function getCliOptionsContext(
  cliOptions: Record<string, unknown>,
  fileOptions: Partial<OptionContext> = {}
) {
  const optionsContext: OptionContext = {
    ...createDefaultOptionsContext(),
    ...fileOptions,
  }
  Object.entries(optionsDefMap).forEach(([optionKey, cliOptionKeys]) => {
    const cliKey = cliOptionKeys.find((key) => cliOptions[key] !== undefined)
    if (cliKey === undefined) return
    const value = cliOptions[cliKey]
    switch (optionKey) {
      case 'ignore':
        optionsContext.ignore = [...optionsContext.ignore, ...toList(value)]
        break
      case 'step': {
        const step = Number(value)
        if (!isValidStep(step)) {
          throw new ConfigError(`--step must be a number in (0, 1], got '${value}'`)
        }
        optionsContext.step = step
        break
      }
      case 'colorBy':
        if (!isColorBy(value)) {
          throw new ConfigError(
            `--color-by must be one of ${COLOR_MODES.join(', ')}, got '${value}'`
          )
        }
        optionsContext.colorBy = value
        break
      case 'cellAspect': {
        const aspect = Number(value)
        if (!isValidAspect(aspect)) {
          throw new ConfigError(`--aspect must be a positive number, got '${value}'`)
        }
        optionsContext.cellAspect = aspect
        break
      }
      case 'mouse':
        // cac always reports `mouse: true` unless `--no-mouse` is given
        if (value === false) optionsContext.mouse = false
        break
    }
  })

  return optionsContext
}
