import iconv from "iconv-lite";

export type RandomSource = () => number;

export function decodeBody(buffer: Buffer, contentType: string | null): string {
  // SharePoint serves UTF-8, but older list exports may declare windows-1251
  const match = contentType?.match(/charset=["']?([\w-]+)/i);
  const charset = match && iconv.encodingExists(match[1]) ? match[1] : "utf-8";
  return iconv.decode(buffer, charset);
}

export function normalizeWhitespace(text: string | null | undefined): string {
  return text ? text.replace(/\s+/g, " ").trim() : "";
}

export function stripChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text[start])) start++;
  while (end > start && chars.includes(text[end - 1])) end--;
  return text.slice(start, end);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Inclusive on both ends
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function weightedPick<T>(values: readonly T[], weights: readonly number[], random: RandomSource = Math.random): T {
  if (values.length === 0 || values.length !== weights.length) {
    throw new Error(`weightedPick: ${values.length} values for ${weights.length} weights`);
  }
  const total = weights.reduce((sum, w) => sum + w, 0);
  let roll = random() * total;
  for (let i = 0; i < values.length; i++) {
    roll -= weights[i];
    if (roll < 0) return values[i];
  }
  return values[values.length - 1];
}

export function parseStrictInt(text: string): number | null {
  return /^\s*[+-]?\d+\s*$/.test(text) ? parseInt(text, 10) : null;
}
