/**
 * Event and summary types for streaming (NDJSON) and final JSON outputs.
 */
import type { ErrorInfo } from "../errors";

export type RunwayAction =
  | "new"
  | "init"
  | "deploy"
  | "destroy"
  | "doctor"
  | "secret"
  | "status"
  | "logs"
  | "eject"
  | "ci"
  | "error";

/** NDJSON event (streaming). */
export interface RunwayEvent {
  readonly action: RunwayAction;
  readonly phase?: string; // e.g. 'validating', 'building', 'done'
  readonly ok?: boolean;
  readonly message?: string;
  readonly buildId?: string;
  readonly service?: string;
  readonly url?: string;
  readonly timestamp?: string; // ISO string when --timestamps
}

/** Final JSON summary, exactly one per command in JSON modes. */
export interface RunwaySummary {
  readonly ok: boolean;
  readonly action: RunwayAction;
  readonly service?: string;
  readonly url?: string;
  readonly message?: string;
  readonly error?: ErrorInfo;
  readonly final: true;
}
