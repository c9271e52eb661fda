export type ResourceType = "manifest" | "location" | "schedule" | "slot";

export interface CrawlStatsSnapshot {
  started_at: string | null;
  ended_at: string | null;
  duration_ms: number | null;
  by_type: Record<string, number>;
  by_host: Record<string, number>;
}

function increment(counts: Map<string, number>, key: string, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

function sortedRecord(counts: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

/**
 * Per-run counters. One instance is created for each crawl and passed to
 * every worker of that run; updates are synchronous, so concurrent async
 * workers cannot interleave within a single `record`.
 */
export class CrawlStats {
  private readonly byType = new Map<string, number>();
  private readonly byHost = new Map<string, number>();
  private startedAt: Date | null = null;
  private endedAt: Date | null = null;

  markStart(at: Date): void {
    this.startedAt = at;
  }

  markEnd(at: Date): void {
    this.endedAt = at;
  }

  /** Malformed URLs still count by type but not by host. */
  record(url: string, type: ResourceType): void {
    increment(this.byType, type);
    let host: string | null = null;
    try {
      host = new URL(url).host;
    } catch {
      host = null;
    }
    if (host) increment(this.byHost, host);
  }

  countFor(type: ResourceType): number {
    return this.byType.get(type) ?? 0;
  }

  countForHost(host: string): number {
    return this.byHost.get(host) ?? 0;
  }

  durationMs(): number | null {
    if (!this.startedAt || !this.endedAt) return null;
    return this.endedAt.getTime() - this.startedAt.getTime();
  }

  toJSON(): CrawlStatsSnapshot {
    return {
      started_at: this.startedAt?.toISOString() ?? null,
      ended_at: this.endedAt?.toISOString() ?? null,
      duration_ms: this.durationMs(),
      by_type: sortedRecord(this.byType),
      by_host: sortedRecord(this.byHost)
    };
  }

  format(): string {
    const lines: string[] = [];
    const duration = this.durationMs();
    lines.push(`Crawling took ${duration === null ? "n/a" : `${(duration / 1000).toFixed(3)}s`}.`);
    lines.push("");
    lines.push("Crawled resources by type:");
    for (const [type, count] of Object.entries(sortedRecord(this.byType))) {
      lines.push(`  ${type}: ${count}`);
    }
    lines.push("");
    lines.push("Crawled resources by host:");
    for (const [host, count] of Object.entries(sortedRecord(this.byHost))) {
      lines.push(`  ${host}: ${count}`);
    }
    return lines.join("\n");
  }
}
