import { UnknownLanguageError } from "../errors";

/**
 * Partial ISO 639-2/B to ISO 639-1 map. Ancient Greek has no two-letter
 * code, so it shares Modern Greek's.
 */
export const LANGUAGE_CODES = {
  chu: "cu",
  cze: "cs",
  eng: "en",
  fre: "fr",
  ger: "de",
  grc: "el",
  heb: "he",
  ita: "it",
  lat: "la",
  pol: "pl",
  rum: "ro",
  rus: "ru",
  scc: "sr",
  scr: "hr",
  slo: "sk",
  slv: "sl",
  swe: "sv",
  ukr: "uk",
} as const satisfies Record<string, string>;

// Collective codes with no two-letter equivalent
export const LANGUAGE_GROUPS = {
  mul: "(Multiple unspecified languages)",
  sla: "(Slavic languages)",
  wen: "(Sorbian languages)",
} as const satisfies Record<string, string>;

export type LanguageCode = keyof typeof LANGUAGE_CODES;
export type LanguageGroupCode = keyof typeof LANGUAGE_GROUPS;

export type ResolvedLanguage =
  | { kind: "language"; code: (typeof LANGUAGE_CODES)[LanguageCode] }
  | { kind: "group"; label: (typeof LANGUAGE_GROUPS)[LanguageGroupCode] };

function isLanguageCode(code: string): code is LanguageCode {
  return Object.hasOwn(LANGUAGE_CODES, code);
}

function isGroupCode(code: string): code is LanguageGroupCode {
  return Object.hasOwn(LANGUAGE_GROUPS, code);
}

export function resolveLanguage(code: string): ResolvedLanguage {
  if (isLanguageCode(code)) {
    return { kind: "language", code: LANGUAGE_CODES[code] };
  }
  if (isGroupCode(code)) {
    return { kind: "group", label: LANGUAGE_GROUPS[code] };
  }
  throw new UnknownLanguageError(code);
}

/**
 * Value of the Language field for the given catalog codes, or null when
 * there are none. Several languages are wrapped in `{{language}}`
 * templates; group labels never are.
 */
export function languageValue(codes: readonly string[]): string | null {
  if (codes.length === 0) return null;

  const resolved = codes.map(resolveLanguage);
  if (resolved.length === 1) {
    const [only] = resolved;
    return only.kind === "language" ? only.code : only.label;
  }

  return resolved
    .map((lang) => (lang.kind === "language" ? `{{language|${lang.code}}}` : lang.label))
    .join(", ");
}
