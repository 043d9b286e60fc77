export type QcConfigurationErrorCode =
  | "EMPTY_MATRIX"
  | "LEVEL_COUNT_MISMATCH"
  | "UNSUPPORTED_LEVEL_COUNT"
  | "MATRIX_TOO_LARGE";

/**
 * Structural problem with an evaluation request. Callers decide whether to
 * surface it as a warning or block downstream export.
 */
export class QcConfigurationError extends Error {
  readonly code: QcConfigurationErrorCode;

  constructor(code: QcConfigurationErrorCode, message: string) {
    super(message);
    this.name = "QcConfigurationError";
    this.code = code;
  }
}
