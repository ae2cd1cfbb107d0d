/**
 * Diagnostics sink
 *
 * Every non-fatal problem the engine runs into (an unbound global, a message
 * nobody understands, a division by zero) is reported here and execution goes
 * on with nil. Aborted executions report here as well before returning nil.
 */

/**
 * Source location
 */
export interface Location {
  file: string;
  line: number;
  column: number;
}

export type DiagnosticKind =
  | 'undefined-identifier'
  | 'message-not-understood'
  | 'arity-mismatch'
  | 'primitive-failed'
  | 'malformed-bytecode'
  | 'resource-exhausted'
  | 'trace';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  location?: Location;
}

export interface Diagnostics {
  report(diagnostic: Diagnostic): void;
}

export function formatLocation(location: Location): string {
  return `${location.file}:${location.line}:${location.column}`;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const prefix = diagnostic.kind === 'trace' ? '[trace]' : 'Error:';
  if (diagnostic.location) {
    return `${prefix} ${diagnostic.message}\n  location: ${formatLocation(diagnostic.location)}`;
  }
  return `${prefix} ${diagnostic.message}`;
}

/**
 * Writes to stderr.
 */
export const consoleDiagnostics: Diagnostics = {
  report(diagnostic: Diagnostic): void {
    console.error(formatDiagnostic(diagnostic));
  },
};

export interface CollectingDiagnostics extends Diagnostics {
  readonly entries: Diagnostic[];
  kinds(): DiagnosticKind[];
  clear(): void;
}

/**
 * Keeps everything in memory (tests, REPL error counting).
 */
export function collectDiagnostics(): CollectingDiagnostics {
  const entries: Diagnostic[] = [];
  return {
    entries,
    report(diagnostic: Diagnostic): void {
      entries.push(diagnostic);
    },
    kinds(): DiagnosticKind[] {
      return entries.map(d => d.kind);
    },
    clear(): void {
      entries.length = 0;
    },
  };
}
