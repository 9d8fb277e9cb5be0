import type { ToolAdapter, ToolInput, ToolOutput, ToolSpec } from "../ToolTypes";
import { failure, success } from "../ToolTypes";
import { readString } from "../args";
import { charLength, formatCount, trimLines } from "../../utils/text";

export const CLEAN_MODES = ["basic", "aggressive", "normalize"] as const;
export type CleanMode = (typeof CLEAN_MODES)[number];

const spec: ToolSpec<"clean_text"> = {
  name: "clean_text",
  description: "Clean text by removing extra spaces, fixing line breaks, and standardizing formatting",
  fields: [
    { name: "text", type: "string", description: "Text to clean", required: true },
    { name: "mode", type: "string", description: "Cleaning mode: basic, aggressive, or normalize", required: false, default: "basic" },
  ],
};

function isCleanMode(value: string): value is CleanMode {
  return CLEAN_MODES.some(m => m === value);
}

export function cleanText(text: string, mode: CleanMode): string {
  switch (mode) {
    case "basic":
      return trimLines(text.replace(/ +/g, " "));
    case "aggressive":
      return text.replace(/\s+/g, " ").trim();
    case "normalize":
      return trimLines(text.trim().replace(/\n{3,}/g, "\n\n").replace(/ +/g, " "));
  }
}

export interface CleanResult {
  mode: CleanMode;
  cleaned: string;
  originalLength: number;
  cleanedLength: number;
}

export class CleanTextAdapter implements ToolAdapter<"clean_text", CleanResult> {
  spec = spec;

  async execute(input: ToolInput): Promise<ToolOutput<CleanResult>> {
    const text = readString(input, "text");
    if (!text.ok) return failure("invalid_argument", text.message);
    const mode = readString(input, "mode", "basic");
    if (!mode.ok) return failure("invalid_argument", mode.message);
    if (!text.value.trim()) return failure("empty_input", "Text is empty.");
    const selected = mode.value.toLowerCase();
    if (!isCleanMode(selected)) return failure("unknown_selector", "Invalid mode. Use: basic, aggressive, or normalize");
    const cleaned = cleanText(text.value, selected);
    return success({ mode: selected, cleaned, originalLength: charLength(text.value), cleanedLength: charLength(cleaned) });
  }

  render(r: CleanResult): string {
    const saved = r.originalLength - r.cleanedLength;
    const pct = ((saved / r.originalLength) * 100).toFixed(1);
    return [
      `✅ **TEXT CLEANED (${r.mode.toUpperCase()} MODE)**`,
      "",
      "📊 **Statistics:**",
      `• Original length: ${formatCount(r.originalLength)} characters`,
      `• Cleaned length: ${formatCount(r.cleanedLength)} characters`,
      `• Saved: ${formatCount(saved)} characters (${pct}%)`,
      "",
      "**Cleaned text:**",
      r.cleaned,
      "",
      "📋 **Copy the cleaned text above!**",
    ].join("\n");
  }
}
