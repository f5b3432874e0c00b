import { TRPCError } from "@trpc/server";

/**
 * Domain errors. Each one is a TRPCError so a router can rethrow it unchanged.
 */

export class ValidationError extends TRPCError {
  constructor(message: string) {
    super({ code: "BAD_REQUEST", message });
    this.name = "ValidationError";
  }
}

/** An operation needs data that does not exist yet (e.g. NAV at a period boundary). */
export class PreconditionError extends TRPCError {
  constructor(message: string) {
    super({ code: "PRECONDITION_FAILED", message });
    this.name = "PreconditionError";
  }
}

/** Illegal state transition, such as paying a fee twice. */
export class StateError extends TRPCError {
  constructor(message: string) {
    super({ code: "CONFLICT", message });
    this.name = "StateError";
  }
}

/** A compare-and-set write saw a newer version than it read. */
export class ConcurrencyError extends TRPCError {
  constructor(
    message: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number
  ) {
    super({ code: "CONFLICT", message });
    this.name = "ConcurrencyError";
  }
}

export class NotFoundError extends TRPCError {
  constructor(message: string) {
    super({ code: "NOT_FOUND", message });
    this.name = "NotFoundError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
