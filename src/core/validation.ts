import type { FieldError } from "./errors.js";

export function asNumber(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isSafeInteger(v) ? v : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
