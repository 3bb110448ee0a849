export type ClaimOutcome = "claimed" | "visited" | "limit";

/**
 * The crawl's only admission gate. `claim` checks membership and the page
 * cap and inserts in one synchronous step, so concurrent branches running
 * on the event loop can never claim the same URL twice or overrun the cap.
 */
export class VisitedSet {
  private readonly urls = new Set<string>();

  constructor(private readonly maxPages?: number) {}

  claim(url: string): ClaimOutcome {
    if (this.urls.has(url)) {
      return "visited";
    }
    if (this.maxPages !== undefined && this.urls.size >= this.maxPages) {
      return "limit";
    }
    this.urls.add(url);
    return "claimed";
  }

  get size(): number {
    return this.urls.size;
  }

  toArray(): string[] {
    return Array.from(this.urls);
  }
}
