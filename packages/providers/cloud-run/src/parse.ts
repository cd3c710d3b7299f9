/**
 * Narrowing helpers for the JSON that `gcloud --format json` prints.
 */
import { RemoteUnknownError } from "@runway/core";

export type Json = Readonly<Record<string, unknown>>;

export function isRecord(v: unknown): v is Json {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function str(v: unknown): string | undefined {
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

export function num(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && /^\d+$/.test(v)) return Number(v);
  return undefined;
}

/** Parse one JSON object printed by gcloud; anything else is a remote failure. */
export function parseObject(text: string, operation: string): Json {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new RemoteUnknownError(`${operation} returned output that is not JSON`, { operation, detail: text.trim().slice(0, 500) });
  }
  if (!isRecord(parsed)) throw new RemoteUnknownError(`${operation} returned an unexpected JSON shape`, { operation });
  return parsed;
}

/** Non-empty trimmed lines. */
export function lines(text: string): string[] {
  return text.split(/\r?\n/).map(l => l.trim()).filter(l => l.length > 0);
}
