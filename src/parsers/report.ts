import type { IntrospectError } from "../errors/introspect-error.js";

/** State shared by the four readelf reports. */
export abstract class ElfReport {
  /** Why readelf produced no report, or null when it ran cleanly */
  readonly failure: IntrospectError | null;

  protected constructor(failure: IntrospectError | null) {
    this.failure = failure;
  }

  get parsingFailed(): boolean {
    return this.failure !== null;
  }
}
