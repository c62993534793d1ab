// packages/pipeline/src/progress.ts
import { errorMessage, type ReportWarning } from "../../model/src/index.js";

export type Stage = "discover" | "parse" | "build" | "rules" | "evaluate" | "report";

export type ProgressEvent =
  | { type: "stage_started"; stage: Stage }
  | { type: "stage_completed"; stage: Stage; duration_ms: number }
  | { type: "warning"; warning: ReportWarning };

export type ProgressListener = (event: ProgressEvent) => void;

/** Delivers events to an optional listener; a listener that throws is recorded, never rethrown. */
export class ProgressEmitter {
  private readonly failures: string[] = [];

  constructor(private readonly listener?: ProgressListener) {}

  emit(event: ProgressEvent): void {
    if (!this.listener) return;
    try {
      this.listener(event);
    } catch (e) {
      this.failures.push(errorMessage(e));
    }
  }

  async stage<T>(stage: Stage, work: () => Promise<T> | T): Promise<T> {
    const started = performance.now();
    this.emit({ type: "stage_started", stage });
    const out = await work();
    this.emit({ type: "stage_completed", stage, duration_ms: Math.round(performance.now() - started) });
    return out;
  }

  /** One warning per distinct failure message. */
  listenerWarnings(): ReportWarning[] {
    return [...new Set(this.failures)].map((m) => ({ source: "pipeline", message: `progress listener failed: ${m}` }));
  }
}
