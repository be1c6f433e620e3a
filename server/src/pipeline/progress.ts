import type { StageName } from "./stages.js";

export type ProgressEvent = {
  stage: StageName | "complete";
  fraction: number;
  message?: string;
};

export interface ProgressReporter {
  report(event: ProgressEvent): void;
}

export const NOOP_PROGRESS: ProgressReporter = {
  report: () => undefined
};

export function clampFraction(fraction: number): number {
  if (!Number.isFinite(fraction)) return 0;
  return Math.min(1, Math.max(0, fraction));
}

/**
 * Forwards each event to every sink in order. A sink that throws is reported
 * through `onSinkError` and skipped; the others still receive the event.
 */
export function fanOutProgress(
  sinks: ProgressReporter[],
  onSinkError: (err: unknown) => void = () => undefined
): ProgressReporter {
  return {
    report(event) {
      const normalized: ProgressEvent = { ...event, fraction: clampFraction(event.fraction) };
      for (const sink of sinks) {
        try {
          sink.report(normalized);
        } catch (err) {
          onSinkError(err);
        }
      }
    }
  };
}
