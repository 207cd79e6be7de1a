import { pipelineLogger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export type DiagnosticKind = "info" | "missing_value" | "warning" | "error";

export interface Diagnostic {
  kind: DiagnosticKind;
  /** Usually the dataset name the message is about */
  identifier: string;
  text: string;
}

/**
 * Receives messages from the resolvers and the pipeline. Rendering and
 * delivery are up to the caller.
 */
export interface DiagnosticsSink {
  info(identifier: string, text: string): void;
  missingValue(identifier: string, valueType: string, value: string): void;
  warning(identifier: string, text: string): void;
  error(identifier: string, text: string): void;
}

// ============================================================================
// Collector
// ============================================================================

/**
 * In-memory sink that deduplicates identical messages
 */
export class DiagnosticsCollector implements DiagnosticsSink {
  private messages = new Map<string, Diagnostic>();

  info(identifier: string, text: string): void {
    this.add({ kind: "info", identifier, text });
  }

  /**
   * A value that could not be mapped to a code, e.g. an unknown org type
   */
  missingValue(identifier: string, valueType: string, value: string): void {
    this.add({
      kind: "missing_value",
      identifier,
      text: `${valueType} ${value} could not be mapped`,
    });
  }

  warning(identifier: string, text: string): void {
    this.add({ kind: "warning", identifier, text });
  }

  error(identifier: string, text: string): void {
    this.add({ kind: "error", identifier, text });
  }

  private add(diagnostic: Diagnostic): void {
    const key = `${diagnostic.kind}|${diagnostic.identifier}|${diagnostic.text}`;
    if (!this.messages.has(key)) {
      this.messages.set(key, diagnostic);
    }
  }

  /**
   * Messages sorted by kind, identifier and text
   */
  list(kind?: DiagnosticKind): Diagnostic[] {
    const all = [...this.messages.values()];
    const filtered =
      kind === undefined ? all : all.filter((d) => d.kind === kind);
    return filtered.sort(
      (a, b) =>
        a.kind.localeCompare(b.kind) ||
        a.identifier.localeCompare(b.identifier) ||
        a.text.localeCompare(b.text)
    );
  }

  counts(): Record<DiagnosticKind, number> {
    const counts: Record<DiagnosticKind, number> = {
      info: 0,
      missing_value: 0,
      warning: 0,
      error: 0,
    };
    for (const diagnostic of this.messages.values()) {
      counts[diagnostic.kind]++;
    }
    return counts;
  }

  /**
   * Write every collected message to the log
   */
  logAll(): void {
    for (const { kind, identifier, text } of this.list()) {
      const entry = { kind, identifier };
      if (kind === "error") pipelineLogger.error(entry, text);
      else if (kind === "info") pipelineLogger.info(entry, text);
      else pipelineLogger.warn(entry, text);
    }
  }
}
