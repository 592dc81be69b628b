const STOPWORDS = new Set([
  "и", "в", "во", "на", "по", "для", "с", "со", "о", "об", "от", "к", "ко", "из", "при", "а", "или",
  "and", "of", "the", "in", "for",
]);

// Study mode, intake year and similar words that share the parentheses with a code
const NOISE_TOKEN = /^(?:очн|заочн|дистанц|форм|обучен|набор|год|г\.?$|о?[оз]фо$|\d{1,4}(?:\s*г\.?)?$)/i;
const SHORT_CODE = /^[A-ZА-ЯЁ]{2,6}$/;
const COURSE_CODE_ARTIFACT = /^\p{L}\d+$/u;
const PROGRAM_CODE = /\d{2}\.\d{2}\.\d{2}/g;
const QUOTED = /[«"“]([^»"”]+)[»"”]/;

function tokenize(text: string): string[] {
  return text.split(/[\s-]+/).filter(Boolean);
}

function initials(tokens: string[]): string {
  return tokens
    .map((t) => t.match(/\p{L}/u)?.[0] ?? "")
    .join("")
    .toUpperCase();
}

function meaningful(tokens: string[], keepStopwords: boolean): string[] {
  return tokens.filter(
    (t) => !COURSE_CODE_ARTIFACT.test(t) && /\p{L}/u.test(t) && (keepStopwords || !STOPWORDS.has(t.toLowerCase()))
  );
}

function codeInParentheses(name: string): string | null {
  for (const match of name.matchAll(/\(([^)]*)\)/g)) {
    const kept = match[1]
      .split(/[\s,;]+/)
      .filter((t) => t && !NOISE_TOKEN.test(t));
    if (kept.length === 1 && SHORT_CODE.test(kept[0])) return kept[0];
  }
  return null;
}

/**
 * Short program code for group names, e.g. "ИВТ" for
 * "09.03.01 Информатика и вычислительная техника". Returns "" when the name
 * has no letters to build one from.
 */
export function deriveAbbreviation(programName: string): string {
  const fromParentheses = codeInParentheses(programName);
  if (fromParentheses) return fromParentheses;

  const quoted = programName.match(QUOTED);
  if (quoted) {
    const abbr = initials(meaningful(tokenize(quoted[1]), false));
    if (abbr.length >= 2) return abbr;
  }

  const bare = programName.replace(/\([^)]*\)/g, " ").replace(PROGRAM_CODE, " ").replace(/[«»"“”.,:;]/g, " ");
  const tokens = tokenize(bare);

  for (const keepStopwords of [false, true]) {
    const abbr = initials(meaningful(tokens, keepStopwords));
    if (abbr.length >= 2) return abbr;
  }

  const letters = (tokens[0] ?? "").match(/\p{L}/gu) ?? [];
  if (letters.length >= 2) return `${letters[0]}${letters[1]}`.toUpperCase();
  if (letters.length === 1) return `${letters[0]}${letters[0]}`.toUpperCase();
  return "";
}
