/**
 * Pipeline Module - Pure Transformations
 */

/**
 * Milliseconds left before a button may fire again; 0 when it may fire now.
 */
export function rateLimitRemainingMs(
  lastAcceptedAt: number | undefined,
  capturedAt: number,
  rateLimitSeconds: number,
): number {
  if (lastAcceptedAt === undefined || rateLimitSeconds <= 0) return 0;
  const elapsed = capturedAt - lastAcceptedAt;
  return Math.max(0, rateLimitSeconds * 1000 - elapsed);
}
