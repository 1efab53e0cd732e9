import * as fs from 'fs'
import * as path from 'path'
import { CONFIG_FILE_NAME, loadConfig, parseConfig } from '../load-config'
import { ConfigError } from '../errors'
import { makeTempDir, cleanDir } from './helpers/testFs'

describe('parseConfig', () => {
  it('reads every option, with comments and trailing commas', () => {
    const text = `{
      // big folders we never care about
      "ignore": ["node_modules", ".git"],
      "step": 0.1,
      "colorBy": "depth",
      "cellAspect": 2.5,
      "mouse": false,
    }`
    expect(parseConfig(text)).toEqual({
      ignore: ['node_modules', '.git'],
      step: 0.1,
      colorBy: 'depth',
      cellAspect: 2.5,
      mouse: false,
    })
  })

  it('ignores unknown keys', () => {
    expect(parseConfig('{ "theme": "dark" }')).toEqual({})
  })

  it('rejects values of the wrong type', () => {
    expect(() => parseConfig('{ "step": 2 }', 'cfg.json')).toThrow(
      'cfg.json: `step` must be a number in (0, 1]'
    )
    expect(() => parseConfig('{ "ignore": "dist" }')).toThrow(
      '`ignore` must be an array of strings'
    )
    expect(() => parseConfig('{ "colorBy": "size" }')).toThrow(
      '`colorBy` must be one of path, depth, kind'
    )
    expect(() => parseConfig('{ "cellAspect": 0 }')).toThrow(
      '`cellAspect` must be a positive number'
    )
    expect(() => parseConfig('{ "mouse": "yes" }')).toThrow('`mouse` must be a boolean')
    expect(() => parseConfig('[1]')).toThrow('expected an object at the top level')
  })

  it('reports syntax errors', () => {
    expect(() => parseConfig('{ "step": }')).toThrow(ConfigError)
    expect(() => parseConfig('{ "step": }')).toThrow('ValueExpected')
  })
})

describe('loadConfig', () => {
  let DIR: string
  beforeEach(() => {
    DIR = makeTempDir('config')
  })
  afterEach(() => cleanDir(DIR))

  it('picks up the config file in the working directory', () => {
    fs.writeFileSync(path.join(DIR, CONFIG_FILE_NAME), '{ "colorBy": "kind" }')
    expect(loadConfig(undefined, DIR)).toEqual({ colorBy: 'kind' })
  })

  it('returns nothing when there is no config file', () => {
    expect(loadConfig(undefined, DIR)).toEqual({})
  })

  it('resolves an explicit path against the working directory', () => {
    fs.writeFileSync(path.join(DIR, 'custom.json'), '{ "step": 0.5 }')
    expect(loadConfig('custom.json', DIR)).toEqual({ step: 0.5 })
  })

  it('fails on an explicit path that cannot be read', () => {
    expect(() => loadConfig('missing.json', DIR)).toThrow(ConfigError)
    expect(() => loadConfig('missing.json', DIR)).toThrow(
      `${path.join(DIR, 'missing.json')}: can't read config`
    )
  })
})
