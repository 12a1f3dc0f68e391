/**
 * In-memory per-source request spacing. Each caller reserves the next free
 * slot before waiting, so concurrent callers queue up instead of all firing
 * once the first delay elapses.
 */
const nextSlot = new Map<string, number>();

export async function acquireRateLimit(
  sourceId: string,
  minDelayMs: number,
): Promise<void> {
  if (minDelayMs <= 0) return;

  const now = Date.now();
  const slot = Math.max(now, nextSlot.get(sourceId) ?? 0);
  nextSlot.set(sourceId, slot + minDelayMs);

  const waitMs = slot - now;
  if (waitMs > 0) {
    await new Promise((resolve) => setTimeout(resolve, waitMs));
  }
}
