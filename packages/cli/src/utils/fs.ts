/**
 * Narrow an unknown thrown value to a Node.js system error.
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
