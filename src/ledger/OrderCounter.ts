export function formatOrderNumber(n: number): string {
  return `#${String(n).padStart(3, "0")}`;
}

/**
 * Hands out order numbers in append order.
 *
 * The sheet row count (header included) equals the number the next data row
 * should get, so it seeds the counter. Rows added by someone else move the
 * count forward; numbers already handed out are never handed out again, even
 * when the append that reserved them failed.
 *
 * Callers must reserve and append inside the same ledger lock.
 */
export class OrderCounter {
  private lastIssued = 0;

  reserve(currentRowCount: number): string {
    const next = Math.max(this.lastIssued + 1, currentRowCount, 1);
    this.lastIssued = next;
    return formatOrderNumber(next);
  }
}
