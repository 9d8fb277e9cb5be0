// Small string helpers shared by the text tools. Lengths and indexes are
// counted in code points, not UTF-16 units.

export function codePoints(input: string): string[] {
  return Array.from(input);
}

export function charLength(input: string): number {
  return codePoints(input).length;
}

export function preview(input: string, max = 100): string {
  const chars = codePoints(input);
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : input;
}

export function splitWords(input: string): string[] {
  return input.split(/\s+/).filter(Boolean);
}

/** First character upper-cased, the rest lower-cased. */
export function capitalize(word: string): string {
  const [first = "", ...rest] = codePoints(word);
  return first.toUpperCase() + rest.join("").toLowerCase();
}

export function trimLines(input: string): string {
  return input.split("\n").map(line => line.trim()).join("\n");
}

export function formatCount(n: number): string {
  return String(n).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

export function ratio(numerator: number, denominator: number): string {
  return (numerator / Math.max(denominator, 1)).toFixed(1);
}
