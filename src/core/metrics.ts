export interface Metrics {
  increment(name: string, value?: number): void;
  /** Records one sample of a distribution such as latency or backoff delay. */
  observe(name: string, value: number): void;
}

export interface Distribution {
  count: number;
  sum: number;
  min: number;
  max: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  distributions: Record<string, Distribution>;
}

export class InMemoryMetrics implements Metrics {
  private readonly counters = new Map<string, number>();
  private readonly distributions = new Map<string, Distribution>();

  increment(name: string, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  observe(name: string, value: number): void {
    const current = this.distributions.get(name);
    if (!current) {
      this.distributions.set(name, { count: 1, sum: value, min: value, max: value });
      return;
    }
    current.count += 1;
    current.sum += value;
    current.min = Math.min(current.min, value);
    current.max = Math.max(current.max, value);
  }

  counter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: Object.fromEntries(this.counters.entries()),
      distributions: Object.fromEntries(
        [...this.distributions.entries()].map(([name, d]) => [name, { ...d }])
      )
    };
  }
}
