export class ProvisionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProvisionError'
  }
}

export class ToolFailure extends ProvisionError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly output: string
  ) {
    super(`Command failed (${exitCode}): ${command}`)
    this.name = 'ToolFailure'
  }
}

export class ResourceMissing extends ProvisionError {
  constructor(public readonly path: string, hint?: string) {
    super(`${path} does not exist${hint ? `. ${hint}` : ''}`)
    this.name = 'ResourceMissing'
  }
}

export class ConfigError extends ProvisionError {
  constructor(public readonly source: string, message: string) {
    super(`Invalid configuration in ${source}: ${message}`)
    this.name = 'ConfigError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
