import type { HeadingLevel, OutlineEntry } from "@mediasift/utils";

const NUMBERED = /^(\d+\.)+\s*\p{Lu}/u;
const DOTTED_NUMBER = /^(\d+(?:\.\d+)+)\s+\p{Lu}/u;
const ROMAN = /^[IVX]+\.\s*\p{Lu}/u;
const LETTERED = /^\p{Lu}\.\s*\p{Lu}/u;
const NOISE = new Set(["page", "copyright", "©"]);

function levelForDepth(depth: number): HeadingLevel {
  if (depth <= 1) return "H1";
  return depth === 2 ? "H2" : "H3";
}

function isUpperCase(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

/**
 * Heading level of a single line, judged from its text alone: section
 * numbering ("2.", "2.1 Scope"), roman numerals, lettered sections and
 * all-caps lines. Returns null for body text.
 */
export function headingLevel(line: string): HeadingLevel | null {
  const text = line.trim();
  if (text.length < 3 || text.length > 200) return null;
  if (/^\d+$/.test(text) || NOISE.has(text.toLowerCase())) return null;

  const numbered = NUMBERED.exec(text);
  if (numbered) {
    const prefix = numbered[0].replace(/\s*\p{Lu}$/u, "");
    return levelForDepth(prefix.split(".").length - 1);
  }
  const dotted = DOTTED_NUMBER.exec(text);
  if (dotted?.[1]) return levelForDepth(dotted[1].split(".").length);

  if (ROMAN.test(text)) return "H1";
  if (LETTERED.test(text)) return "H2";
  if (isUpperCase(text) && text.length > 5) return "H2";
  return null;
}

export function extractOutline(text: string, page: number): OutlineEntry[] {
  const entries: OutlineEntry[] = [];
  for (const line of text.split("\n")) {
    const level = headingLevel(line);
    if (level) entries.push({ level, text: line.trim(), page });
  }
  return entries;
}

/** First line of the page that is long enough to be a title, among its first ten. */
export function titleFromText(text: string): string | null {
  for (const line of text.split("\n").slice(0, 10)) {
    const candidate = line.trim();
    if (candidate.length > 10 && candidate.length < 100) return candidate;
  }
  return null;
}
