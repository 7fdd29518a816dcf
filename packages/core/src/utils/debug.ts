// debug.ts
export function dlog(ns: string, ...args: unknown[]): void {
  if (!isDebugEnabled(ns)) return;
  // eslint-disable-next-line no-console
  console.log(`[${ns}]`, ...args);
}

/**
 * Whether `ns` is listed in `DEBUG` (comma/space separated, `socket-pipe:*` enables all).
 */
export function isDebugEnabled(ns: string): boolean {
  const dbg = process.env.DEBUG;
  if (!dbg) return false;
  const tokens = dbg.split(/[\s,]+/).filter(Boolean);
  return tokens.includes(ns) || tokens.includes('socket-pipe:*');
}
