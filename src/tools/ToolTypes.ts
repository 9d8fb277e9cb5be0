import type { Logger } from "pino";

export const TOOL_NAMES = [
  "validate",
  "count_text",
  "convert_case",
  "clean_text",
  "base64_converter",
  "generate_password",
  "extract_data",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ToolInput = Record<string, unknown>;

export type FieldType = "string" | "integer" | "boolean";

export interface ToolField {
  readonly name: string;
  readonly type: FieldType;
  readonly description: string;
  readonly required: boolean;
  readonly default?: string | number | boolean;
}

export interface ToolSpec<N extends ToolName = ToolName> {
  readonly name: N;
  readonly description: string;
  readonly fields: readonly ToolField[];
}

export type ToolErrorKind =
  | "unknown_tool"
  | "unknown_selector"
  | "empty_input"
  | "out_of_range"
  | "decode_failure"
  | "no_match"
  | "unauthorized"
  | "invalid_argument"
  | "internal";

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
}

export type ToolOutput<T> = { ok: true; data: T } | { ok: false; error: ToolError };

export interface ToolContext {
  requestId: string;
  logger: Logger;
}

export interface ToolAdapter<N extends ToolName = ToolName, T = unknown> {
  spec: ToolSpec<N>;
  execute(input: ToolInput, ctx: ToolContext): Promise<ToolOutput<T>>;
  render(data: T): string;
}

/** One adapter per known tool name; a missing entry fails to compile. */
export type ToolTable = { [N in ToolName]: ToolAdapter<N> };

export interface TextContent {
  type: "text";
  text: string;
}

export function success<T>(data: T): ToolOutput<T> {
  return { ok: true, data };
}

export function failure<T = never>(kind: ToolErrorKind, message: string): ToolOutput<T> {
  return { ok: false, error: { kind, message } };
}
