import { errorMessage } from "./errors.js";
import type { JobRecord, SourceKind, SourceReport } from "./types.js";

export interface JobSource {
  readonly name: string;
  readonly kind: SourceKind;
  records(signal?: AbortSignal): AsyncIterable<JobRecord>;
  /** Counters so far; final once `records` has been drained. */
  report(): SourceReport;
}

/**
 * Chains sources into one lazy sequence. Each source is drained before the
 * next one starts, in registration order, so per-source counters and logs
 * keep clean boundaries. A source that throws is closed with a
 * `source-error` report and the next source starts.
 */
export class JobSourceAggregator {
  private readonly sources: JobSource[] = [];
  private readonly failures = new Map<JobSource, string>();

  register(source: JobSource): this {
    this.sources.push(source);
    return this;
  }

  get size(): number {
    return this.sources.length;
  }

  async *records(signal?: AbortSignal): AsyncGenerator<JobRecord, void, undefined> {
    for (const source of this.sources) {
      if (signal?.aborted) {
        console.log(`Aggregator: cancelled before source ${source.name}`);
        return;
      }

      try {
        for await (const record of source.records(signal)) {
          yield record;
        }
      } catch (error) {
        const message = errorMessage(error);
        this.failures.set(source, message);
        console.error(`Aggregator: source ${source.name} failed: ${message}`);
      }
    }
  }

  reports(): SourceReport[] {
    return this.sources.map((source) => {
      const report = source.report();
      const failure = this.failures.get(source);
      return failure === undefined ? report : { ...report, outcome: "source-error", error: failure };
    });
  }

  hasFetchFailures(): boolean {
    return this.reports().some((report) => report.outcome === "fetch-failure");
  }
}
