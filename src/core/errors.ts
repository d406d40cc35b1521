export type ParseErrorKind =
  | 'InvalidCommandDefinition'
  | 'UnknownSubcommand'
  | 'UnknownOption'
  | 'IllegalShortOption'
  | 'MissingOptionArgument'
  | 'InvalidIntegerValue'
  | 'InvalidFloatValue'
  | 'NoActionReachable';

/**
 * Failure of a parse. `subject` names the command, option or token involved.
 */
export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly subject: string;

  constructor(kind: ParseErrorKind, subject: string, message: string) {
    super(message);
    this.name = 'ParseError';
    this.kind = kind;
    this.subject = subject;
  }
}

export function isParseError(value: unknown): value is ParseError {
  return value instanceof ParseError;
}
