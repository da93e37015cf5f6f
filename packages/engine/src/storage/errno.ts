/** The `code` of a Node.js system error (`ENOENT`, `EEXIST`, ...). */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
