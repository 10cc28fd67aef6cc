// backend/services/shared/src/errors/StartupError.ts
/**
 * Purpose:
 * - Single error type for everything that aborts process start:
 *   bad configuration, an unreachable database, a colliding route table.
 *
 * Invariants:
 * - Never caught and continued. The entry point logs it and exits(1).
 */

export type StartupFailureCode =
  | "CONFIG_MISSING"
  | "CONFIG_INVALID"
  | "DB_CONNECT_FAILED"
  | "ROUTE_CONFLICT";

export class StartupError extends Error {
  public readonly code: StartupFailureCode;

  constructor(
    code: StartupFailureCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${code}: ${message}`, options);
    this.name = "StartupError";
    this.code = code;
  }

  public static is(err: unknown): err is StartupError {
    return err instanceof StartupError;
  }
}
