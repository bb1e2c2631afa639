/**
 * Structured error type for readelf introspection.
 *
 * Carries a machine-readable code, category, and optional
 * remediation hint so callers can programmatically handle errors.
 */

export type ErrorCategory =
  | "validation"
  | "not_found"
  | "timeout"
  | "tool_failure"
  | "shape_contract";

export class IntrospectError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly remediation?: string;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    remediation?: string,
  ) {
    super(message);
    this.name = "IntrospectError";
    this.code = code;
    this.category = category;
    this.remediation = remediation;
  }
}

/**
 * readelf printed something a derivation relies on in a shape it does not
 * recognise. Never recorded as a soft failure; it always propagates.
 */
export class ReportShapeError extends IntrospectError {
  readonly value: string;

  constructor(message: string, value: string) {
    super(
      message,
      "UNEXPECTED_REPORT_SHAPE",
      "shape_contract",
      "Check the installed readelf version against the supported report layout",
    );
    this.name = "ReportShapeError";
    this.value = value;
  }
}
