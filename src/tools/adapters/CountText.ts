import type { ToolAdapter, ToolInput, ToolOutput, ToolSpec } from "../ToolTypes";
import { failure, success } from "../ToolTypes";
import { readString } from "../args";
import { charLength, formatCount, ratio, splitWords } from "../../utils/text";

const spec: ToolSpec<"count_text"> = {
  name: "count_text",
  description: "Count words, characters, sentences, and paragraphs in text",
  fields: [
    { name: "text", type: "string", description: "Text to analyze", required: true },
  ],
};

const WORDS_PER_MINUTE = 200;

export interface TextStats {
  charactersWithSpaces: number;
  charactersWithoutSpaces: number;
  words: number;
  sentences: number;
  paragraphs: number;
  lines: number;
  readingTimeMinutes: number;
}

function countParagraphs(text: string): number {
  const nonBlank = (parts: string[]) => parts.filter(p => p.trim()).length;
  if (/\n[^\S\n]*\n/.test(text)) return nonBlank(text.split(/\n[^\S\n]*\n/));
  return nonBlank(text.split("\n"));
}

export function analyzeText(text: string): TextStats {
  const words = splitWords(text).length;
  return {
    charactersWithSpaces: charLength(text),
    charactersWithoutSpaces: charLength(text.replace(/[ \n\t]/g, "")),
    words,
    sentences: Math.max(1, (text.match(/[.!?]+/g) ?? []).length),
    paragraphs: countParagraphs(text),
    lines: text.split("\n").length,
    readingTimeMinutes: Math.max(1, Math.floor(words / WORDS_PER_MINUTE)),
  };
}

export class CountTextAdapter implements ToolAdapter<"count_text", TextStats> {
  spec = spec;

  async execute(input: ToolInput): Promise<ToolOutput<TextStats>> {
    const text = readString(input, "text");
    if (!text.ok) return failure("invalid_argument", text.message);
    if (!text.value.trim()) return failure("empty_input", "Text is empty.");
    return success(analyzeText(text.value));
  }

  render(s: TextStats): string {
    return [
      "📊 **TEXT STATISTICS**",
      "",
      "📝 **Basic Counts:**",
      `• Characters (with spaces): ${formatCount(s.charactersWithSpaces)}`,
      `• Characters (no spaces): ${formatCount(s.charactersWithoutSpaces)}`,
      `• Words: ${formatCount(s.words)}`,
      `• Sentences: ${formatCount(s.sentences)}`,
      `• Paragraphs: ${formatCount(s.paragraphs)}`,
      `• Lines: ${formatCount(s.lines)}`,
      "",
      "📈 **Analysis:**",
      `• Average words per sentence: ${ratio(s.words, s.sentences)}`,
      `• Average characters per word: ${ratio(s.charactersWithoutSpaces, s.words)}`,
      `• Estimated reading time: ${s.readingTimeMinutes} minute(s)`,
      "",
      "✅ **Analysis complete!**",
    ].join("\n");
  }
}
