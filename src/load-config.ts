import path from 'node:path'
import fs from 'node:fs'
import { parse, printParseErrorCode } from 'jsonc-parser'
import { ConfigError, getErrorMessage } from './errors'
import type { ParseError } from 'jsonc-parser'
import type { ColorBy, OptionContext } from './types'

export const CONFIG_FILE_NAME = '.treemaprc.json'
export const COLOR_MODES: readonly ColorBy[] = ['path', 'depth', 'kind']

export function isColorBy(value: unknown): value is ColorBy {
  return COLOR_MODES.some((mode) => mode === value)
}
export function isValidStep(value: unknown): value is number {
  return typeof value === 'number' && value > 0 && value <= 1
}
export function isValidAspect(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0
}
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

export function parseConfig(
  text: string,
  configPath?: string
): Partial<OptionContext> {
  const errors: ParseError[] = []
  const raw: unknown = parse(text, errors, { allowTrailingComma: true })
  const [firstError] = errors
  if (firstError) {
    throw new ConfigError(
      `${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`,
      configPath
    )
  }
  if (raw === undefined) {
    return {}
  }
  if (!isRecord(raw)) {
    throw new ConfigError('expected an object at the top level', configPath)
  }

  const config: Partial<OptionContext> = {}
  if (raw.ignore !== undefined) {
    if (!isStringArray(raw.ignore)) {
      throw new ConfigError('`ignore` must be an array of strings', configPath)
    }
    config.ignore = raw.ignore
  }
  if (raw.step !== undefined) {
    if (!isValidStep(raw.step)) {
      throw new ConfigError('`step` must be a number in (0, 1]', configPath)
    }
    config.step = raw.step
  }
  if (raw.colorBy !== undefined) {
    if (!isColorBy(raw.colorBy)) {
      throw new ConfigError(
        `\`colorBy\` must be one of ${COLOR_MODES.join(', ')}`,
        configPath
      )
    }
    config.colorBy = raw.colorBy
  }
  if (raw.cellAspect !== undefined) {
    if (!isValidAspect(raw.cellAspect)) {
      throw new ConfigError('`cellAspect` must be a positive number', configPath)
    }
    config.cellAspect = raw.cellAspect
  }
  if (raw.mouse !== undefined) {
    if (typeof raw.mouse !== 'boolean') {
      throw new ConfigError('`mouse` must be a boolean', configPath)
    }
    config.mouse = raw.mouse
  }
  return config
}

/**
 * Reads the given config file, or `.treemaprc.json` in `cwd` when no path
 * is given and that file exists.
 */
export function loadConfig(
  configPath?: string,
  cwd = process.cwd()
): Partial<OptionContext> {
  const targetPath = configPath
    ? path.resolve(cwd, configPath)
    : path.join(cwd, CONFIG_FILE_NAME)
  if (!configPath && !fs.existsSync(targetPath)) {
    return {}
  }

  let text: string
  try {
    text = fs.readFileSync(targetPath, 'utf8')
  } catch (err) {
    throw new ConfigError(`can't read config (${getErrorMessage(err)})`, targetPath)
  }
  return parseConfig(text, targetPath)
}
