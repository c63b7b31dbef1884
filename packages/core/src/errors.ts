export class RomLoadError extends Error {
  constructor(public readonly path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`cannot read ROM ${path}: ${detail}`, { cause });
    this.name = 'RomLoadError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly option: string, message: string) {
    super(`${option}: ${message}`);
    this.name = 'ConfigError';
  }
}
