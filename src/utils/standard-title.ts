import { ParsedTitle } from '../types/standard';

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Splits a result title such as `GB/T123 食品安全通用要求` into code and name
 * at the first space. Titles without a space have no code.
 */
export function parseStandardTitle(rawTitle: string): ParsedTitle {
  const title = normalizeWhitespace(rawTitle);
  const boundary = title.indexOf(' ');
  if (boundary === -1) {
    return { std_code: '', std_name: title };
  }

  return {
    std_code: title.slice(0, boundary),
    std_name: title.slice(boundary + 1),
  };
}
