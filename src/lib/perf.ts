type PerfStats = {
  count: number;
  totalMs: number;
  maxMs: number;
};

export type PerfReport = Record<string, { count: number; avgMs: number; maxMs: number }>;

export type PerfCollector = {
  enabled: boolean;
  mark: (name: string, durationMs: number) => void;
  reset: () => void;
  report: () => PerfReport;
};

type PerfGlobal = typeof globalThis & {
  __layoutEnginePerf?: PerfCollector;
};

export function isPerfEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.LAYOUT_ENGINE_PERF;
  return value === "1" || value === "true";
}

export function createPerfCollector(enabled: boolean): PerfCollector {
  const stats = new Map<string, PerfStats>();

  const mark = (name: string, durationMs: number) => {
    if (!enabled || !Number.isFinite(durationMs)) {
      return;
    }
    const current = stats.get(name) ?? { count: 0, totalMs: 0, maxMs: 0 };
    current.count += 1;
    current.totalMs += durationMs;
    current.maxMs = Math.max(current.maxMs, durationMs);
    stats.set(name, current);
  };

  const reset = () => {
    stats.clear();
  };

  const report = () => {
    const result: PerfReport = {};
    for (const [name, value] of stats.entries()) {
      result[name] = {
        count: value.count,
        avgMs: value.count > 0 ? Number((value.totalMs / value.count).toFixed(2)) : 0,
        maxMs: Number(value.maxMs.toFixed(2))
      };
    }
    return result;
  };

  return { enabled, mark, reset, report };
}

/** Process-wide collector, created on first use from `LAYOUT_ENGINE_PERF`. */
export function initLayoutPerfCollector(): PerfCollector {
  const perfGlobal: PerfGlobal = globalThis;
  if (!perfGlobal.__layoutEnginePerf) {
    perfGlobal.__layoutEnginePerf = createPerfCollector(isPerfEnabled());
  }
  return perfGlobal.__layoutEnginePerf;
}

export function markLayoutPerf(name: string, durationMs: number): void {
  initLayoutPerfCollector().mark(name, durationMs);
}
