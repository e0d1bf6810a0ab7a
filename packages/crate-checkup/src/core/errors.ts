/**
 * Raised when the project root cannot be analyzed at all. This is the only
 * error that aborts a run.
 */
export class ContextError extends Error {
  constructor(
    message: string,
    public readonly projectPath: string,
  ) {
    super(message);
    this.name = "ContextError";
  }
}

export interface ConfigErrorLocation {
  file: string;
  line?: number;
  column?: number;
  /** dotted key path, e.g. `checks.enabled.CODE001` */
  keyPath?: string;
}

export class ConfigError extends Error {
  readonly file: string;
  readonly line?: number;
  readonly column?: number;
  readonly keyPath?: string;

  constructor(message: string, location: ConfigErrorLocation) {
    super(message);
    this.name = "ConfigError";
    this.file = location.file;
    this.line = location.line;
    this.column = location.column;
    this.keyPath = location.keyPath;
  }

  /** `file:line:column` or `file (key)` for display */
  get where(): string {
    if (this.line !== undefined) {
      return this.column !== undefined
        ? `${this.file}:${this.line}:${this.column}`
        : `${this.file}:${this.line}`;
    }
    return this.keyPath ? `${this.file} (${this.keyPath})` : this.file;
  }
}

export class CheckTimeoutError extends Error {
  constructor(
    public readonly checkCode: string,
    public readonly timeoutMs: number,
  ) {
    super(`check ${checkCode} did not finish within ${timeoutMs}ms`);
    this.name = "CheckTimeoutError";
  }
}
