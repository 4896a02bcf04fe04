/** Reason codes for rejected adapter inputs. */
export type SourceErrorReason = "not_iterable";

/** Error thrown when a value cannot be turned into a `Source`. */
export class SourceError extends Error {
  constructor(
    readonly reason: SourceErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "SourceError";
  }
}
