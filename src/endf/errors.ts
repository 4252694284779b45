export type EndfErrorKind =
  | 'MALFORMED_FIELD'
  | 'UNEXPECTED_END_OF_STREAM'
  | 'UNTERMINATED_DIRECTORY'
  | 'UNEXPECTED_RECORD';

/**
 * Base class for every hard failure raised while decoding a tape.
 *
 * `line` is the 1-based physical line the fault was found on. When the stream
 * runs out it is the last line read, or `null` if nothing was read.
 */
export class EndfParseError extends Error {
  constructor(
    readonly kind: EndfErrorKind,
    message: string,
    readonly line: number | null,
    readonly expected: string,
  ) {
    super(line === null ? `${message} (at start of stream, expected ${expected})` : `${message} (line ${line}, expected ${expected})`);
    this.name = 'EndfParseError';
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      line: this.line,
      expected: this.expected,
    };
  }
}

export class MalformedFieldError extends EndfParseError {
  constructor(readonly slot: string, line: number | null, expected: string) {
    super('MALFORMED_FIELD', `Malformed ENDF field "${slot}"`, line, expected);
    this.name = 'MalformedFieldError';
  }
}

export class UnexpectedEndOfStreamError extends EndfParseError {
  constructor(expected: string, linesRead: number) {
    super(
      'UNEXPECTED_END_OF_STREAM',
      'Unexpected end of ENDF stream',
      linesRead > 0 ? linesRead : null,
      expected,
    );
    this.name = 'UnexpectedEndOfStreamError';
  }
}

export class UnterminatedDirectoryError extends EndfParseError {
  constructor(entriesRead: number, linesRead: number) {
    super(
      'UNTERMINATED_DIRECTORY',
      `Directory not terminated after ${entriesRead} entries`,
      linesRead > 0 ? linesRead : null,
      'directory SEND record (MT=0)',
    );
    this.name = 'UnterminatedDirectoryError';
  }
}

export class UnexpectedRecordError extends EndfParseError {
  constructor(found: { mf: number; mt: number }, line: number, expected: string) {
    super('UNEXPECTED_RECORD', `Unexpected record MF=${found.mf} MT=${found.mt}`, line, expected);
    this.name = 'UnexpectedRecordError';
  }
}
