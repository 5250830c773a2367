/**
 * Machine-readable error codes carried by every {@link KeypathError}.
 */
export type KeypathErrorCode =
  | 'STRUCTURAL_TYPE'
  | 'UNSUPPORTED_MUTATION'
  | 'UNRESOLVED_TEMPLATE'
  | 'TRANSFORM_FAILED'
  | 'TRANSFORM_UNKNOWN'
  | 'INVALID_OPTIONS'
  | 'PAYLOAD_REQUIRED';

const PREFIX = '[keypath]';

/**
 * Base class for every error raised by the engine.
 *
 * Absence (a missing key, index or field) is never reported through this
 * hierarchy; it is recovered locally by the traversal.
 */
export class KeypathError extends Error {
  readonly code: KeypathErrorCode;

  constructor(code: KeypathErrorCode, message: string) {
    super(`${PREFIX} ${message}`);
    this.code = code;
    this.name = this.constructor.name;
  }
}

/**
 * A non-empty operator tail reached a value that cannot be navigated and no
 * default structure applies.
 */
export class StructuralTypeError extends KeypathError {
  /** Rendered path prefix up to the offending value. */
  readonly path: string;

  constructor(path: string, actual: string) {
    super(
      'STRUCTURAL_TYPE',
      `Cannot update ${actual} at '${path || '<root>'}'`
    );
    this.path = path;
  }
}

/** Mutation through a read-only selection (a filtered sub-sequence view). */
export class UnsupportedMutationError extends KeypathError {
  constructor(message: string) {
    super('UNSUPPORTED_MUTATION', message);
  }
}

/** A template substitution or document reference could not be resolved. */
export class UnresolvedTemplateError extends KeypathError {
  /** Rendered form of the unresolved matcher. */
  readonly template: string;

  constructor(template: string, reason: string) {
    super('UNRESOLVED_TEMPLATE', `Unresolved ${template}: ${reason}`);
    this.template = template;
  }
}

export class TransformError extends KeypathError {
  readonly transform: string;

  constructor(
    code: 'TRANSFORM_FAILED' | 'TRANSFORM_UNKNOWN',
    transform: string,
    message: string
  ) {
    super(code, `Transform '${transform}': ${message}`);
    this.transform = transform;
  }
}

export class InvalidOptionsError extends KeypathError {
  /** Flattened `path: message` lines from the schema validation. */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_OPTIONS', `Invalid options: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class MissingPayloadError extends KeypathError {
  constructor(message: string) {
    super('PAYLOAD_REQUIRED', message);
  }
}
