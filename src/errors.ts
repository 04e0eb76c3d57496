/* ── rejection kinds ─────────────────────────────────────── */
export type ErrorKind = "ValidationError" | "CapacityError" | "StaleTargetError";

export type RejectCode =
  /* transactions */
  | "duplicate"
  | "mempool-full"
  | "invalid-fee"
  | "invalid-address"
  | "invalid-amount"
  | "insufficient-balance"
  /* blocks */
  | "stale-height"
  | "stale-parent"
  | "stale-target"
  | "bad-timestamp"
  | "future-timestamp"
  | "too-many-transactions"
  | "bad-tx-id"
  | "duplicate-transaction"
  | "confirmed-transaction"
  | "bad-hash"
  | "insufficient-work"
  /* wire */
  | "malformed";

const KIND_OF: Record<RejectCode, ErrorKind> = {
  duplicate: "ValidationError",
  "mempool-full": "CapacityError",
  "invalid-fee": "ValidationError",
  "invalid-address": "ValidationError",
  "invalid-amount": "ValidationError",
  "insufficient-balance": "ValidationError",
  "stale-height": "StaleTargetError",
  "stale-parent": "StaleTargetError",
  "stale-target": "StaleTargetError",
  "bad-timestamp": "ValidationError",
  "future-timestamp": "ValidationError",
  "too-many-transactions": "ValidationError",
  "bad-tx-id": "ValidationError",
  "duplicate-transaction": "ValidationError",
  "confirmed-transaction": "ValidationError",
  "bad-hash": "ValidationError",
  "insufficient-work": "ValidationError",
  malformed: "ValidationError",
};

export interface Rejection {
  readonly kind: ErrorKind;
  readonly code: RejectCode;
  readonly message: string;
}

/** Expected failures travel as values; only faults are thrown. */
export type Outcome<T> =
  | { readonly status: "accepted"; readonly value: T }
  | { readonly status: "rejected"; readonly rejection: Rejection };

export const accepted = <T>(value: T): Outcome<T> => ({ status: "accepted", value });

export const rejected = <T = never>(code: RejectCode, message: string): Outcome<T> => ({
  status: "rejected",
  rejection: { kind: KIND_OF[code], code, message },
});

/**
 * Internal invariant violation (broken hash chain, balances that do not
 * replay). Never repaired; the operator has to look at the store.
 */
export class ConsistencyFault extends Error {
  constructor(
    message: string,
    readonly blockIndex?: number,
  ) {
    super(message);
    this.name = "ConsistencyFault";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
