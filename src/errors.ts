// ============================================================================
// Domain Error Classes
// ============================================================================

export class ConfigurationError extends Error {
  code = "CONFIGURATION_ERROR" as const;
  details?: string[];

  constructor(message: string, details?: string[]) {
    super(message);
    this.name = "ConfigurationError";
    this.details = details;
  }
}

export class FilterSyntaxError extends Error {
  code = "FILTER_SYNTAX_ERROR" as const;
  position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${String(position)}`);
    this.name = "FilterSyntaxError";
    this.position = position;
  }
}

export class SourceReadError extends Error {
  code = "SOURCE_READ_ERROR" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceReadError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
