// ============================================================================
// @zxconv/core — Error Types
// ============================================================================
//
// Structural header problems are not thrown: header decoders return an
// `ok: false` result and callers fall back to "no header present".
// Everything below aborts the current conversion.
// ============================================================================

/**
 * Base error class for all zxconv errors.
 */
export class ZxConvError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ZxConvError';
  }
}

// ---------------------------------------------------------------------------
// Encoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a Unicode character has no byte in the active codepage
 * and is outside the Latin-1 fallback.
 */
export class EncodingError extends ZxConvError {
  public readonly char: string;
  public readonly index: number;

  constructor(char: string, index: number) {
    const codePoint = char.codePointAt(0) ?? 0;
    super(
      `Cannot encode "${char}" (U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}) at index ${index}: no ZX Spectrum representation`,
    );
    this.name = 'EncodingError';
    this.char = char;
    this.index = index;
  }
}

/**
 * Thrown when an assembler line number does not fit the 16-bit field.
 */
export class LineNumberRangeError extends ZxConvError {
  public readonly lineNumber: number;

  constructor(lineNumber: number) {
    super(`Line number ${lineNumber} is outside 0..65535`);
    this.name = 'LineNumberRangeError';
    this.lineNumber = lineNumber;
  }
}

// ---------------------------------------------------------------------------
// Header Errors
// ---------------------------------------------------------------------------

/**
 * Thrown by the header factories when a field value is out of range.
 */
export class HeaderFieldError extends ZxConvError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid header field "${field}" (${String(value)}): ${reason}`);
    this.name = 'HeaderFieldError';
    this.field = field;
    this.value = value;
  }
}

// ---------------------------------------------------------------------------
// Option Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when options fail schema validation.
 */
export class OptionsValidationError extends ZxConvError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join('; ')}`);
    this.name = 'OptionsValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when mutually exclusive options are combined.
 */
export class ConflictingOptionsError extends ZxConvError {
  public readonly options: string[];

  constructor(options: string[], message: string) {
    super(message);
    this.name = 'ConflictingOptionsError';
    this.options = options;
  }
}
