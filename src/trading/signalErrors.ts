export type SignalErrorKind =
  | "NoDirection"
  | "NoAsset"
  | "NoTimeframe"
  | "UnsupportedTimeframe"
  | "UnknownRule"
  | "InvalidEntryPrice"
  | "PriceUnavailable";

export interface SignalErrorDetails {
  readonly asset?: string;
  readonly timeframe?: string;
  readonly expected?: readonly string[];
}

/**
 * Caller-visible failure of the parse or calculation step. Returned inside a
 * `Result`, so one bad message never stops a caller working through a batch.
 */
export class SignalError extends Error {
  readonly kind: SignalErrorKind;
  readonly details: SignalErrorDetails;

  constructor(kind: SignalErrorKind, message: string, details: SignalErrorDetails = {}) {
    super(message);
    this.name = "SignalError";
    this.kind = kind;
    this.details = details;
  }
}
