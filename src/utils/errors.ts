export type RejectReason =
  | "ModuleInactive"
  | "DecodeError"
  | "InvalidSignature"
  | "OrderCanceled"
  | "StaleTradeArgs"
  | "PriceOutOfBounds"
  | "FeeOutOfBounds"
  | "NotTriggered"
  | "Expired"
  | "AccountMismatch"
  | "TakerMismatch"
  | "MarketMismatch"
  | "DirectionMismatch"
  | "ZeroInput"
  | "Overfill"
  | "DecreaseViolation"
  | "Unauthorized";

/**
 * Every rejection raised by the engine. `reason` is stable and meant for
 * programmatic checks; `message` is for humans.
 */
export class CanonicalOrderError extends Error {
  readonly reason: RejectReason;
  readonly orderHash: string | null;
  readonly details: Record<string, string>;

  constructor(
    reason: RejectReason,
    message: string,
    opts: { orderHash?: string; details?: Record<string, string> } = {}
  ) {
    super(opts.orderHash ? `${message} <${opts.orderHash}>` : message);
    this.name = "CanonicalOrderError";
    this.reason = reason;
    this.orderHash = opts.orderHash ?? null;
    this.details = opts.details ?? {};
  }
}

/**
 * Throw a CanonicalOrderError unless `condition` holds.
 */
export function requireThat(
  condition: boolean,
  reason: RejectReason,
  message: string,
  opts: { orderHash?: string; details?: Record<string, string> } = {}
): asserts condition {
  if (!condition) {
    throw new CanonicalOrderError(reason, message, opts);
  }
}

export function isRejection(err: unknown): err is CanonicalOrderError {
  return err instanceof CanonicalOrderError;
}
