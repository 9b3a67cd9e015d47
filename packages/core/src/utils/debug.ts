// debug.ts

function enabled(ns: string, dbg: string): boolean {
  // comma/space separated; "ramses:*" style wildcards match a whole prefix
  return dbg.split(/[\s,]+/).some((token) => {
    if (!token) return false;
    if (token === '*' || token === ns) return true;
    return token.endsWith(':*') && ns.startsWith(token.slice(0, -1));
  });
}

/**
 * Prints `[ns] ...args` when `DEBUG` enables the namespace, e.g.
 * `DEBUG=ramses:transport,ramses:serial` or `DEBUG=ramses:*`.
 */
export function dlog(ns: string, ...args: unknown[]) {
  const dbg = process.env.DEBUG;
  if (!dbg || !enabled(ns, dbg)) return;
  // eslint-disable-next-line no-console
  console.log(`[${ns}]`, ...args);
}
