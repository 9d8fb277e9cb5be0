import type { ToolAdapter, ToolInput, ToolOutput, ToolSpec } from "../ToolTypes";
import { failure, success } from "../ToolTypes";
import { readString } from "../args";
import { capitalize, codePoints, preview, splitWords } from "../../utils/text";

export const CASE_TYPES = ["upper", "lower", "title", "sentence", "camel", "pascal", "snake", "kebab", "alternating"] as const;
export type CaseType = (typeof CASE_TYPES)[number];

const spec: ToolSpec<"convert_case"> = {
  name: "convert_case",
  description: "Convert text to different cases (upper, lower, title, camel, snake, kebab, etc.)",
  fields: [
    { name: "text", type: "string", description: "Text to convert", required: true },
    { name: "case_type", type: "string", description: `Case type: ${CASE_TYPES.join(", ")}`, required: true },
  ],
};

function isCaseType(value: string): value is CaseType {
  return CASE_TYPES.some(c => c === value);
}

function alphanumericWords(text: string): string[] {
  return splitWords(text.replace(/[^a-zA-Z0-9\s]/g, ""));
}

function separated(text: string, sep: "_" | "-"): string {
  return text
    .trim()
    .replace(/[^a-zA-Z0-9]/g, sep)
    .toLowerCase()
    .replace(sep === "_" ? /_+/g : /-+/g, sep)
    .replace(sep === "_" ? /^_+|_+$/g : /^-+|-+$/g, "");
}

export function convertCase(text: string, caseType: CaseType): string {
  switch (caseType) {
    case "upper":
      return text.toUpperCase();
    case "lower":
      return text.toLowerCase();
    case "title":
      return text.replace(/\S+/g, capitalize);
    case "sentence":
      return capitalize(text);
    case "camel": {
      const [first, ...rest] = alphanumericWords(text);
      if (first === undefined) return text;
      return first.toLowerCase() + rest.map(capitalize).join("");
    }
    case "pascal":
      return alphanumericWords(text).map(capitalize).join("");
    case "snake":
      return separated(text, "_");
    case "kebab":
      return separated(text, "-");
    case "alternating":
      return codePoints(text).map((c, i) => (i % 2 === 0 ? c.toUpperCase() : c.toLowerCase())).join("");
  }
}

export interface CaseConversion {
  caseType: CaseType;
  original: string;
  result: string;
}

export class ConvertCaseAdapter implements ToolAdapter<"convert_case", CaseConversion> {
  spec = spec;

  async execute(input: ToolInput): Promise<ToolOutput<CaseConversion>> {
    const text = readString(input, "text");
    if (!text.ok) return failure("invalid_argument", text.message);
    const caseType = readString(input, "case_type");
    if (!caseType.ok) return failure("invalid_argument", caseType.message);
    if (!text.value.trim()) return failure("empty_input", "Text is empty.");
    const selected = caseType.value.toLowerCase();
    if (!isCaseType(selected)) {
      return failure(
        "unknown_selector",
        "Invalid case type. Available options:\n• upper, lower, title, sentence\n• camel, pascal, snake, kebab\n• alternating",
      );
    }
    return success({ caseType: selected, original: text.value, result: convertCase(text.value, selected) });
  }

  render(c: CaseConversion): string {
    return [
      `✅ **${c.caseType.toUpperCase()} CASE CONVERSION**`,
      "",
      `**Original:** ${preview(c.original)}`,
      `**Result:** ${c.result}`,
      "",
      "📋 **Copy the result above!**",
    ].join("\n");
  }
}
