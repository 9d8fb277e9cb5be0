import type { ToolInput } from "./ToolTypes";

// Argument readers: absent values fall back to the default, wrong primitive
// types come back as a message for an invalid_argument error.
export type ArgResult<T> = { ok: true; value: T } | { ok: false; message: string };

export function readString(input: ToolInput, key: string, fallback = ""): ArgResult<string> {
  const v = input[key];
  if (v === undefined || v === null) return { ok: true, value: fallback };
  if (typeof v !== "string") return { ok: false, message: `'${key}' must be a string` };
  return { ok: true, value: v };
}

export function readBoolean(input: ToolInput, key: string, fallback: boolean): ArgResult<boolean> {
  const v = input[key];
  if (v === undefined || v === null) return { ok: true, value: fallback };
  if (typeof v === "boolean") return { ok: true, value: v };
  if (v === "true" || v === "false") return { ok: true, value: v === "true" };
  return { ok: false, message: `'${key}' must be a boolean` };
}

export function readInteger(input: ToolInput, key: string, fallback: number): ArgResult<number> {
  const v = input[key];
  if (v === undefined || v === null) return { ok: true, value: fallback };
  if (typeof v === "number" && Number.isInteger(v)) return { ok: true, value: v };
  if (typeof v === "string" && /^-?\d+$/.test(v.trim())) return { ok: true, value: Number(v.trim()) };
  return { ok: false, message: `'${key}' must be an integer` };
}
