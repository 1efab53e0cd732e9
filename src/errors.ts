export class ScanError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly code = 'UNKNOWN'
  ) {
    super(message)
    this.name = 'ScanError'
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath?: string) {
    super(configPath ? `${configPath}: ${message}` : message)
    this.name = 'ConfigError'
  }
}

// errno errors may come from another realm (a vm context, Jest's sandbox),
// so they are recognised by shape rather than by `instanceof Error`
export function getErrorCode(err: unknown) {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return 'UNKNOWN'
}

export function getErrorMessage(err: unknown) {
  if (
    typeof err === 'object' &&
    err !== null &&
    'message' in err &&
    typeof err.message === 'string'
  ) {
    return err.message
  }
  return String(err)
}
