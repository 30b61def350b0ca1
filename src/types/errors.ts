/**
 * Error catalog for the Jack compiler.
 */
export enum ErrorCode {
  LEXICAL_ERROR = 'LEXICAL_ERROR',
  SYNTAX_ERROR = 'SYNTAX_ERROR',
  UNRESOLVED_IDENTIFIER = 'UNRESOLVED_IDENTIFIER',
  MALFORMED_CONSTRUCT = 'MALFORMED_CONSTRUCT',
}

const withLine = (message: string, line?: number): string =>
  line === undefined ? message : `[line ${line}] ${message}`;

export class JackError extends Error {
  readonly code: ErrorCode;
  readonly line?: number;

  constructor(code: ErrorCode, message: string, line?: number) {
    super(withLine(message, line));
    this.name = new.target.name;
    this.code = code;
    this.line = line;
  }
}

export class LexicalError extends JackError {
  constructor(message: string, line: number) {
    super(ErrorCode.LEXICAL_ERROR, message, line);
  }
}

export class JackSyntaxError extends JackError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string, line?: number) {
    super(ErrorCode.SYNTAX_ERROR, `Expected ${expected}, but got ${actual}`, line);
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnresolvedIdentifierError extends JackError {
  readonly identifier: string;

  constructor(identifier: string, line?: number) {
    super(ErrorCode.UNRESOLVED_IDENTIFIER, `Could not find "${identifier}" in any symbol table`, line);
    this.identifier = identifier;
  }
}

export class MalformedConstructError extends JackError {
  constructor(message: string, line?: number) {
    super(ErrorCode.MALFORMED_CONSTRUCT, message, line);
  }
}
