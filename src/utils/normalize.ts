export const normalizeToken = (value: string): string => value.trim().toLowerCase();

/** Upper-cases every letter that follows a non-letter, lower-cases the rest ("anti-aging" -> "Anti-Aging"). */
export const toTitleCase = (value: string): string =>
  value.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());

export const textLength = (value: string): number => Array.from(value).length;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
