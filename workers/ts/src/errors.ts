export type PanelErrorCode = "USAGE" | "CONFIG" | "SOURCE";

export class PanelError extends Error {
  readonly code: PanelErrorCode;

  constructor(code: PanelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UsageError extends PanelError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export class ConfigError extends PanelError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

/** Raised when a panel store or revision source cannot be read at all. */
export class SourceError extends PanelError {
  constructor(message: string, cause?: unknown) {
    super("SOURCE", message, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
