export type ReportLevel = "info" | "warn" | "error";

export type ReportEvent = {
  level: ReportLevel;
  event: string; // ex: "series.resolved"
  message: string;
  data?: Record<string, unknown>;
};

export type Reporter = { report(e: ReportEvent): void };

const rank: Record<ReportLevel, number> = { info: 0, warn: 1, error: 2 };

export function createConsoleReporter(minLevel: ReportLevel = "info"): Reporter {
  return {
    report(e) {
      if (rank[e.level] < rank[minLevel]) return;
      const line = `[${e.event}] ${e.message}`;
      const extra = e.data ?? "";
      if (e.level === "error") console.error(line, extra);
      else if (e.level === "warn") console.warn(line, extra);
      else console.log(line, extra);
    },
  };
}

export function createMemoryReporter() {
  const events: ReportEvent[] = [];
  const reporter: Reporter = { report: (e) => void events.push(e) };
  return {
    reporter,
    events,
    named: (event: string) => events.filter((e) => e.event === event),
  };
}

export const silentReporter: Reporter = { report: () => {} };
