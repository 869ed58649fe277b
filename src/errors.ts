/**
 * Error classes raised while parsing templates, capturing snapshots or
 * resolving deferred blocks.
 */

export const PhasedErrorCode = {
  UNCLOSED_BLOCK: 'UNCLOSED_BLOCK',
  UNKNOWN_VARIABLE: 'UNKNOWN_VARIABLE',
  MALFORMED_SNAPSHOT: 'MALFORMED_SNAPSHOT',
  UNSERIALIZABLE_VALUE: 'UNSERIALIZABLE_VALUE',
  TEMPLATE_SYNTAX: 'TEMPLATE_SYNTAX',
} as const;

export type PhasedErrorCodeType = (typeof PhasedErrorCode)[keyof typeof PhasedErrorCode];

/**
 * Base class for all errors of this package.
 */
export class PhasedError extends Error {
  constructor (
    message: string,
    public readonly code: PhasedErrorCodeType,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PhasedError';
  }
}

/**
 * A block tag was opened but the template ended before its terminator.
 */
export class UnclosedBlockError extends PhasedError {
  constructor (
    public readonly tagName: string,
    public readonly expected: string,
  ) {
    super(`Unclosed tag '${tagName}'. Looking for one of: ${expected}`, PhasedErrorCode.UNCLOSED_BLOCK, { tagName, expected });
    this.name = 'UnclosedBlockError';
  }
}

/**
 * A deferred block requested a variable that is not in the rendering context.
 */
export class UnknownVariableError extends PhasedError {
  constructor (public readonly variable: string) {
    super(`"phased" tag got an unknown variable: '${variable}'`, PhasedErrorCode.UNKNOWN_VARIABLE, { variable });
    this.name = 'UnknownVariableError';
  }
}

/**
 * A requested variable holds a value that cannot be carried in a snapshot.
 */
export class UnserializableValueError extends PhasedError {
  constructor (
    public readonly variable: string,
    public readonly valueType: string,
  ) {
    super(`"phased" tag cannot keep variable '${variable}' of type ${valueType}`, PhasedErrorCode.UNSERIALIZABLE_VALUE, { variable, valueType });
    this.name = 'UnserializableValueError';
  }
}

/**
 * The snapshot section of a marker could not be decoded.
 */
export class MalformedSnapshotError extends PhasedError {
  constructor (message: string, context?: Record<string, unknown>) {
    super(`Malformed snapshot: ${message}`, PhasedErrorCode.MALFORMED_SNAPSHOT, context);
    this.name = 'MalformedSnapshotError';
  }
}

/**
 * Invalid tag usage in a template.
 */
export class TemplateSyntaxError extends PhasedError {
  constructor (message: string, context?: Record<string, unknown>) {
    super(message, PhasedErrorCode.TEMPLATE_SYNTAX, context);
    this.name = 'TemplateSyntaxError';
  }
}
