/**
 * Error taxonomy and per-file diagnostics.
 *
 * Only InvalidRequestError aborts a command. Parse and I/O failures are caught at
 * the file boundary and recorded as diagnostics so a batch keeps going.
 */

export type GraphErrorCode =
  | 'invalid-request'
  | 'parse-failure'
  | 'io-failure'
  | 'invalid-document'
  | 'invalid-profile'
  | 'registry-sealed'
  | 'registry-open';

export class GraphError extends Error {
  readonly code: GraphErrorCode;

  constructor(code: GraphErrorCode, message: string) {
    super(message);
    this.name = 'GraphError';
    this.code = code;
  }
}

/**
 * The request itself cannot be served (directory given where a file is needed,
 * export path not writable, unknown function). Fails the whole command.
 */
export class InvalidRequestError extends GraphError {
  constructor(message: string) {
    super('invalid-request', message);
    this.name = 'InvalidRequestError';
  }
}

export class ParseFailureError extends GraphError {
  readonly file: string;
  readonly line: number | null;
  readonly column: number | null;

  constructor(file: string, message: string, line: number | null = null, column: number | null = null) {
    super('parse-failure', message);
    this.name = 'ParseFailureError';
    this.file = file;
    this.line = line;
    this.column = column;
  }
}

export class IOFailureError extends GraphError {
  readonly file: string;

  constructor(file: string, message: string) {
    super('io-failure', message);
    this.name = 'IOFailureError';
    this.file = file;
  }
}

/** A JSON interchange document that does not validate */
export class DocumentFormatError extends GraphError {
  constructor(message: string) {
    super('invalid-document', message);
    this.name = 'DocumentFormatError';
  }
}

export type DiagnosticKind =
  | 'parse-failure'
  | 'io-failure'
  | 'unsupported-language'
  | 'unresolved-reference';

export interface Diagnostic {
  file: string;
  kind: DiagnosticKind;
  message: string;
  line?: number;
  column?: number;
}

/**
 * Append-only diagnostic collection for one batch
 */
export class Diagnostics {
  private readonly items: Diagnostic[] = [];

  add(diagnostic: Diagnostic): void {
    this.items.push(diagnostic);
  }

  addAll(diagnostics: Diagnostic[]): void {
    this.items.push(...diagnostics);
  }

  /**
   * Record a caught file-level error. Anything that is not a parse or I/O failure
   * is rethrown.
   */
  record(file: string, error: unknown): void {
    if (error instanceof ParseFailureError) {
      this.add({
        file,
        kind: 'parse-failure',
        message: error.message,
        ...(error.line !== null ? { line: error.line } : {}),
        ...(error.column !== null ? { column: error.column } : {}),
      });
      return;
    }
    if (error instanceof IOFailureError) {
      this.add({ file, kind: 'io-failure', message: error.message });
      return;
    }
    throw error;
  }

  list(): Diagnostic[] {
    return [...this.items];
  }

  ofKind(kind: DiagnosticKind): Diagnostic[] {
    return this.items.filter((item) => item.kind === kind);
  }

  get size(): number {
    return this.items.length;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
