/**
 * Extract a human-readable message from an unknown thrown value.
 */
export function getErrorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Node's error code (ENOENT, EACCES, ...) when the value carries one */
export function getErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}
