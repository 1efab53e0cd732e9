import semver from 'semver'
import chalk from 'chalk'

export const SUPPORTED_NODE_RANGE = '>=20'

export function checkNodeVersion(version: string, semverRange: string) {
  if (typeof version !== 'string' || typeof semverRange !== 'string') {
    throw new TypeError('`version` and `semverRange` arguments required')
  }

  if (!semver.validRange(semverRange)) {
    throw new Error('Invalid version range')
  }

  const coerced = semver.coerce(version)
  if (coerced && semver.satisfies(coerced, semverRange)) {
    return
  }

  const error = new Error(
    `Node.js ${version} doesn't satisfy the version requirement of ${semverRange}`
  )
  error.name = 'InvalidNodeVersion'
  throw error
}

export default function ensureNodeVersion(version = process.versions.node) {
  try {
    checkNodeVersion(version, SUPPORTED_NODE_RANGE)
  } catch (nodeVersionErr) {
    console.log(`\n${chalk.red(nodeVersionErr)}\n`)
    process.exit(1)
  }
}
