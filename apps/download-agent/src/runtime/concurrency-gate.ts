/** Workers allowed to run at the same time against one site. */
export const PER_SITE_CONCURRENCY = 1;

export class ConcurrencyGate {
  private readonly reservations = new Map<string, Set<number>>();

  private total = 0;

  constructor(private limit: number) {}

  getLimit(): number {
    return this.limit;
  }

  setLimit(limit: number): void {
    this.limit = limit;
  }

  activeCount(): number {
    return this.total;
  }

  isReserved(siteKey: string): boolean {
    return (this.reservations.get(siteKey)?.size ?? 0) > 0;
  }

  tryReserve(siteKey: string, jobId: number): boolean {
    if (this.total >= this.limit) {
      return false;
    }

    const holders = this.reservations.get(siteKey) ?? new Set<number>();
    if (holders.size >= PER_SITE_CONCURRENCY || holders.has(jobId)) {
      return false;
    }

    holders.add(jobId);
    this.reservations.set(siteKey, holders);
    this.total += 1;
    return true;
  }

  /** Safe to call for a reservation that was never made or is already released. */
  release(siteKey: string, jobId: number): void {
    const holders = this.reservations.get(siteKey);
    if (!holders?.delete(jobId)) {
      return;
    }

    this.total -= 1;
    if (holders.size === 0) {
      this.reservations.delete(siteKey);
    }
  }
}
