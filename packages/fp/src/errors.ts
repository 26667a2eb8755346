import { debugLog } from "@seqlist/core";

/** Reason codes for list precondition failures. */
export type SeqlistErrorReason = "empty_access" | "length_mismatch";

/** Base class for precondition failures reported by list operations. */
export class SeqlistError extends Error {
  constructor(
    readonly reason: SeqlistErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "SeqlistError";
    debugLog("fp", `${reason}: ${message}`);
  }
}

/** The head or tail of an empty list was requested. */
export class EmptyAccessError extends SeqlistError {
  constructor(readonly operation: "head" | "tail") {
    super("empty_access", `Cannot take the ${operation} of an empty list`);
    this.name = "EmptyAccessError";
  }
}

/** Two lists combined positionally have different lengths. */
export class LengthMismatchError extends SeqlistError {
  constructor(
    readonly leftLength: number,
    readonly rightLength: number,
  ) {
    super(
      "length_mismatch",
      `Lists do not have the same length (${leftLength} vs ${rightLength})`,
    );
    this.name = "LengthMismatchError";
  }
}
