import { MIN_PHONE_MATCH_LENGTH } from "../../shared/constants";

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_PATTERN = /\+?\(?[0-9]{1,4}\)?[-\s.]?\(?[0-9]{1,4}\)?[-\s.]?[0-9]{1,5}[-\s.]?[0-9]{1,5}/;
const YEARS_PATTERN = /(\d+)\s*(?:years?|yrs?)/;

export function parseEmail(text: string): string | null {
  const match = text.match(EMAIL_PATTERN);
  return match ? match[0] : null;
}

// Only the first candidate is considered; short digit runs are not phone numbers.
export function parsePhone(text: string): string | null {
  const match = text.match(PHONE_PATTERN);
  if (!match || match[0].length < MIN_PHONE_MATCH_LENGTH) {
    return null;
  }
  return match[0];
}

export function parseYearsOfExperience(text: string): number | null {
  const match = text.toLowerCase().match(YEARS_PATTERN);
  if (!match) {
    return null;
  }
  const years = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(years) && years >= 0 ? years : null;
}
