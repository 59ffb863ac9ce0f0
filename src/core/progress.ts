import type { Clock } from "./clock.js";
import type { ProgressEvent, ProgressSink, Stage } from "../types/run.js";

export type OutputFormat = "human" | "jsonl";

export const noopSink: ProgressSink = () => {};

/** Bind a sink to a clock so components only name the stage, unit and state. */
export function createEmitter(sink: ProgressSink, clock: Clock) {
  return (stage: Stage, unitId: string | null, state: string, detail?: Record<string, unknown>): void => {
    const event: ProgressEvent = {
      unit_id: unitId,
      stage,
      state,
      timestamp: new Date(clock.now()).toISOString(),
    };
    if (detail) event.detail = detail;
    sink(event);
  };
}

export type Emitter = ReturnType<typeof createEmitter>;

export function formatEvent(event: ProgressEvent, format: OutputFormat): string {
  if (format === "jsonl") return JSON.stringify(event);
  const unit = event.unit_id ?? "-";
  return `[${event.stage}] ${unit} ${event.state}`;
}

/** Sink that writes one line per event to a stream (stdout in the CLI). */
export function streamSink(out: NodeJS.WritableStream, format: OutputFormat): ProgressSink {
  return (event) => {
    out.write(formatEvent(event, format) + "\n");
  };
}
