import type { ToolAdapter, ToolInput, ToolOutput, ToolSpec } from "../ToolTypes";
import { failure, success } from "../ToolTypes";
import { readString } from "../args";

export const DATA_CATEGORIES = ["emails", "urls", "phones"] as const;
export type DataCategory = (typeof DATA_CATEGORIES)[number];
export type DataType = DataCategory | "all";

const spec: ToolSpec<"extract_data"> = {
  name: "extract_data",
  description: "Extract emails, URLs, or phone numbers from text",
  fields: [
    { name: "text", type: "string", description: "Text to search through", required: true },
    { name: "data_type", type: "string", description: "What to extract: 'emails', 'urls', 'phones', or 'all'", required: true },
  ],
};

const DISPLAY_LIMIT = 10;
const EMAIL_RE = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const URL_RE = /\bhttps?:\/\/[A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=%]+/g;
const URL_TRAILING_PUNCT = /[.,;:!?]+$/;
// North American numbers are normalized to ddd-ddd-dddd; the looser pattern keeps the raw match.
const NANP_PHONE_RE = /\+?1?[-.\s]?\(?([0-9]{3})\)?[-.\s]?([0-9]{3})[-.\s]?([0-9]{4})/g;
const INTL_PHONE_RE = /\+?[0-9]{1,3}[-.\s]?[0-9]{3,4}[-.\s]?[0-9]{3,4}[-.\s]?[0-9]{3,4}/g;

const EMOJI: Record<DataCategory, string> = { emails: "📧", urls: "🔗", phones: "📱" };

function unique(items: Iterable<string>): string[] {
  return Array.from(new Set(items));
}

export function extractEmails(text: string): string[] {
  return unique(text.match(EMAIL_RE) ?? []);
}

function count(s: string, ch: string): number {
  return s.split(ch).length - 1;
}

function trimUrl(url: string): string {
  let u = url.replace(URL_TRAILING_PUNCT, "");
  while (u.endsWith(")") && count(u, ")") > count(u, "(")) u = u.slice(0, -1).replace(URL_TRAILING_PUNCT, "");
  return u;
}

export function extractUrls(text: string): string[] {
  return unique((text.match(URL_RE) ?? []).map(trimUrl));
}

export function extractPhones(text: string): string[] {
  const nanp = Array.from(text.matchAll(NANP_PHONE_RE), m => m.slice(1).join("-"));
  const intl = text.match(INTL_PHONE_RE) ?? [];
  return unique([...nanp, ...intl]);
}

const EXTRACTORS: Record<DataCategory, (text: string) => string[]> = {
  emails: extractEmails,
  urls: extractUrls,
  phones: extractPhones,
};

function isDataType(value: string): value is DataType {
  return value === "all" || DATA_CATEGORIES.some(c => c === value);
}

export interface ExtractedCategory {
  category: DataCategory;
  items: string[];
}

export interface Extraction {
  categories: ExtractedCategory[];
  total: number;
}

export function extractData(text: string, dataType: DataType): Extraction {
  const wanted: readonly DataCategory[] = dataType === "all" ? DATA_CATEGORIES : [dataType];
  const categories = wanted
    .map(category => ({ category, items: EXTRACTORS[category](text) }))
    .filter(c => c.items.length > 0);
  return { categories, total: categories.reduce((n, c) => n + c.items.length, 0) };
}

export class ExtractDataAdapter implements ToolAdapter<"extract_data", Extraction> {
  spec = spec;

  async execute(input: ToolInput): Promise<ToolOutput<Extraction>> {
    const text = readString(input, "text");
    if (!text.ok) return failure("invalid_argument", text.message);
    const dataType = readString(input, "data_type");
    if (!dataType.ok) return failure("invalid_argument", dataType.message);
    if (!text.value.trim()) return failure("empty_input", "Text is empty.");
    const selected = dataType.value.toLowerCase();
    if (!isDataType(selected)) return failure("unknown_selector", "Invalid data type. Use: emails, urls, phones, or all");
    const extraction = extractData(text.value, selected);
    if (extraction.total === 0) return failure("no_match", `No ${selected} found in the text.`);
    return success(extraction);
  }

  render(e: Extraction): string {
    const lines = ["🔍 **EXTRACTED DATA**"];
    for (const { category, items } of e.categories) {
      lines.push("", `${EMOJI[category]} **${category.toUpperCase()}** (${items.length} found):`);
      for (const item of items.slice(0, DISPLAY_LIMIT)) lines.push(`• ${item}`);
      if (items.length > DISPLAY_LIMIT) lines.push(`• ... and ${items.length - DISPLAY_LIMIT} more`);
    }
    lines.push("", `✅ **Total found:** ${e.total} items`);
    return lines.join("\n");
  }
}
