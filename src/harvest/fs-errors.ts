const TRANSIENT_CODES = new Set(["ENOENT", "EACCES", "EPERM", "EBUSY"]);

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Errors an export file can hit while the instrument writes, rotates or deletes it.
 * These mean "no data this cycle" rather than failure.
 */
export function isTransientFsError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && TRANSIENT_CODES.has(code);
}
