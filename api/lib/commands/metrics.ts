/**
 * Command Metrics
 *
 * Per-command counters and durations, labelled by platform.
 */

export type CommandOutcome = "success" | "failure" | "validation_failed" | "parse_failed";

export interface MetricsSink {
  recordCommand(platform: string, command: string, outcome: CommandOutcome): void;
  recordDuration(platform: string, command: string, durationMs: number): void;
}

/**
 * Sink for contexts without a metrics backend (the CLI).
 */
export const noopMetrics: MetricsSink = {
  recordCommand: () => undefined,
  recordDuration: () => undefined,
};

export interface CommandCount {
  platform: string;
  command: string;
  outcome: CommandOutcome;
  count: number;
}

export interface CommandDuration {
  platform: string;
  command: string;
  count: number;
  totalMs: number;
  maxMs: number;
}

export interface MetricsSnapshot {
  commands: CommandCount[];
  durations: CommandDuration[];
}

/**
 * Process-local counters for the webhook service, reported by its
 * health endpoint. Records arrive in completion order; every update is
 * a synchronous read-modify-write, so concurrent dispatches on the event
 * loop cannot interleave within one.
 */
export class InMemoryMetrics implements MetricsSink {
  private readonly counts = new Map<string, CommandCount>();
  private readonly durations = new Map<string, CommandDuration>();

  recordCommand(platform: string, command: string, outcome: CommandOutcome): void {
    const key = `${platform}/${command}/${outcome}`;
    const existing = this.counts.get(key);
    if (existing) {
      existing.count++;
    } else {
      this.counts.set(key, { platform, command, outcome, count: 1 });
    }
  }

  recordDuration(platform: string, command: string, durationMs: number): void {
    const key = `${platform}/${command}`;
    const existing = this.durations.get(key);
    if (existing) {
      existing.count++;
      existing.totalMs += durationMs;
      existing.maxMs = Math.max(existing.maxMs, durationMs);
    } else {
      this.durations.set(key, { platform, command, count: 1, totalMs: durationMs, maxMs: durationMs });
    }
  }

  count(platform: string, command: string, outcome: CommandOutcome): number {
    return this.counts.get(`${platform}/${command}/${outcome}`)?.count ?? 0;
  }

  snapshot(): MetricsSnapshot {
    return {
      commands: [...this.counts.values()].map((entry) => ({ ...entry })),
      durations: [...this.durations.values()].map((entry) => ({ ...entry })),
    };
  }
}
