export function errorMessage(err: unknown): string {
  if (err instanceof Error && typeof err.message === "string" && err.message) return err.message;
  return String(err);
}

/** Decrypt failures, bad nonces and corrupt saves. */
export class IntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IntegrityError";
  }
}

export const GENERIC_ERROR_MESSAGE = "Oops, something wrong happened 😢";

export const KEY_RECOVERY_HINT =
  "If you have lost your encryption key please generate a new one using the -g flag";
