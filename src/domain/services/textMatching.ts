const DIACRITICS = /[\u0300-\u036f]/g;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

/**
 * Trims, case-folds, strips diacritics and collapses whitespace so that
 * "Está   DISPONIBLE" and "esta disponible" compare equal.
 */
export function normalizeText(text: string): string {
  return text
    .normalize("NFD")
    .replace(DIACRITICS, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

function phrasePattern(phrase: string): string {
  const escaped = phrase.replace(REGEX_SPECIALS, "\\$&");
  // Only anchor on a word boundary where the phrase itself starts or ends with a word character,
  // so symbols such as "€" still match in "300€".
  const head = /^[\p{L}\p{N}]/u.test(phrase) ? "(?<![\\p{L}\\p{N}])" : "";
  const tail = /[\p{L}\p{N}]$/u.test(phrase) ? "(?![\\p{L}\\p{N}])" : "";
  return `${head}${escaped}${tail}`;
}

/**
 * Matches a fixed list of phrases against normalized text on word boundaries.
 */
export class PhraseMatcher {
  private readonly patterns: Array<{ phrase: string; regex: RegExp }>;

  constructor(phrases: readonly string[]) {
    this.patterns = phrases
      .map((p) => normalizeText(p))
      .filter((p) => p.length > 0)
      .map((phrase) => ({ phrase, regex: new RegExp(phrasePattern(phrase), "u") }));
  }

  matches(normalized: string): boolean {
    return this.patterns.some((p) => p.regex.test(normalized));
  }

  /** Phrases present in the text, in lexicon order. */
  findAll(normalized: string): string[] {
    return this.patterns.filter((p) => p.regex.test(normalized)).map((p) => p.phrase);
  }

  get size(): number {
    return this.patterns.length;
  }
}
