import { P99_MIN_SAMPLES, TICK_SAMPLE_SIZE } from "@arena/shared-sim";

export interface TickStatisticsSnapshot {
  averageTickMs: number;
  maxTickMs: number;
  p99TickMs: number | undefined;
  totalTicks: number;
}

/** Rolling tick-duration samples. The max is all-time; average and p99 cover the window. */
export class TickStatistics {
  private readonly samples: number[] = [];
  private cursor = 0;
  private total = 0;
  private max = 0;

  constructor(private readonly capacity: number = TICK_SAMPLE_SIZE) {}

  record(durationMs: number): void {
    if (this.samples.length < this.capacity) {
      this.samples.push(durationMs);
    } else {
      this.samples[this.cursor] = durationMs;
    }
    this.cursor = (this.cursor + 1) % this.capacity;
    this.total += 1;
    this.max = Math.max(this.max, durationMs);
  }

  get totalTicks(): number {
    return this.total;
  }

  get averageTickMs(): number {
    if (this.samples.length === 0) {
      return 0;
    }
    let sum = 0;
    for (const sample of this.samples) {
      sum += sample;
    }
    return sum / this.samples.length;
  }

  get maxTickMs(): number {
    return this.max;
  }

  /** Undefined until enough samples exist to make the percentile meaningful. */
  get p99TickMs(): number | undefined {
    const count = this.samples.length;
    if (count < P99_MIN_SAMPLES) {
      return undefined;
    }
    const sorted = [...this.samples].sort((a, b) => a - b);
    return sorted[Math.min(Math.floor(count * 0.99), count - 1)];
  }

  snapshot(): TickStatisticsSnapshot {
    return {
      averageTickMs: this.averageTickMs,
      maxTickMs: this.maxTickMs,
      p99TickMs: this.p99TickMs,
      totalTicks: this.totalTicks,
    };
  }

  reset(): void {
    this.samples.length = 0;
    this.cursor = 0;
    this.total = 0;
    this.max = 0;
  }
}
