/**
 * Failures that escape the code that detected them. Unresolvable sources,
 * missing metrics and unknown revision dates are expected outcomes and travel
 * as `Resolution` values instead.
 */
export type SyncErrorKind = 'malformed-document' | 'output-write-failure' | 'usage';

export class SyncError extends Error {
  readonly kind: SyncErrorKind;

  constructor(message: string, kind: SyncErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.kind = kind;
  }
}

export class MalformedDocumentError extends SyncError {
  /** Section being parsed when the defect was found; empty before the first header */
  readonly section: string;
  readonly line: number;

  constructor(message: string, section: string, line: number) {
    super(`${message} (section [${section}], line ${line})`, 'malformed-document');
    this.section = section;
    this.line = line;
  }
}

export class MissingSectionHeaderError extends MalformedDocumentError {
  constructor(line: number) {
    super('File contains no section headers', '', line);
  }
}

export class OutputWriteError extends SyncError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write manifest to ${path}`, 'output-write-failure', { cause });
    this.path = path;
  }
}

export class UsageError extends SyncError {
  constructor(message: string) {
    super(message, 'usage');
  }
}
