/**
 * Short unique ids for correlating log lines of one request or run.
 *
 * @example
 *   generateId()       // "1714000000000_k3j8f9d2x"
 *   generateId('req')  // "req_1714000000000_k3j8f9d2x"
 */
export function generateId(prefix = ''): string {
  const ts = Date.now();
  const rand = Math.random().toString(36).slice(2, 11);
  return prefix ? `${prefix}_${ts}_${rand}` : `${ts}_${rand}`;
}
