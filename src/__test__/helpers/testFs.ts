import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'

/** Nested description of a directory: strings are file contents */
export interface TreeSpec {
  [name: string]: string | TreeSpec
}

export function makeTempDir(label: string) {
  return fs.mkdtempSync(path.join(os.tmpdir(), `term-treemap-${label}-`))
}

export function writeTree(root: string, spec: TreeSpec) {
  fs.mkdirSync(root, { recursive: true })
  for (const [name, entry] of Object.entries(spec)) {
    const target = path.join(root, name)
    if (typeof entry === 'string') {
      fs.writeFileSync(target, entry, 'utf8')
    } else {
      writeTree(target, entry)
    }
  }
}

export function cleanDir(p: string) {
  fs.rmSync(p, { recursive: true, force: true })
}
