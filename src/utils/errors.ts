// ── Configuration ────────────────────────────────────────────

export class ConfigurationError extends Error {
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ── Tool resolution ──────────────────────────────────────────
// Raised when the backend names a tool the engine never registered.
// The schema list and the tool map are built together, so this means
// the backend invented a name.

export class UnknownToolError extends Error {
  readonly exitCode = 3;

  constructor(readonly toolName: string) {
    super(`Backend requested unknown tool "${toolName}"`);
    this.name = 'UnknownToolError';
  }
}

export class ToolArgumentsError extends Error {
  readonly exitCode = 3;

  constructor(readonly toolName: string, detail: string) {
    super(`Invalid arguments for tool "${toolName}": ${detail}`);
    this.name = 'ToolArgumentsError';
  }
}

// ── Module output ────────────────────────────────────────────

export class IncompleteOutputError extends Error {
  readonly exitCode = 4;

  constructor(
    readonly missing: readonly string[],
    readonly responseText: string,
  ) {
    super(`Response is missing required outputs: ${missing.join(', ')}`);
    this.name = 'IncompleteOutputError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
