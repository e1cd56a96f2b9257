/**
 * In-process tracing registry
 * Collects the activity source names providers ask to have traced.
 */

import type { TracingTarget } from '../providers/types';

export class TracingRegistry implements TracingTarget {
  private sources: Set<string> = new Set();
  private requests = 0;

  /**
   * Subscribe activity sources. Names already subscribed are ignored.
   */
  addSources(names: readonly string[]): void {
    this.requests++;
    for (const name of names) {
      if (name.trim()) {
        this.sources.add(name);
      }
    }
  }

  isSubscribed(name: string): boolean {
    return this.sources.has(name);
  }

  /** Subscribed source names in subscription order */
  get subscribedSources(): string[] {
    return Array.from(this.sources);
  }

  /** Number of addSources() calls received */
  get requestCount(): number {
    return this.requests;
  }
}
