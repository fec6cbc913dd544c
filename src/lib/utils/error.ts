/**
 * Message of an unknown thrown value
 */
export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

/**
 * Node filesystem error with the given code (ENOENT, EEXIST, ...)
 */
export const isErrnoException = (e: unknown, code?: string): e is NodeJS.ErrnoException =>
  e instanceof Error && 'code' in e && (code === undefined || e.code === code);
