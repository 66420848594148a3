import { getMissingFields } from "../profiles/candidate-profile";
import { parseEmail, parsePhone, parseYearsOfExperience } from "../profiles/parsers/contact.parser";
import {
  JOB_ROLE_KEYWORDS,
  POSITION_FALLBACK_MAX_LENGTH,
  SHORT_ANSWER_MAX_TOKENS,
} from "../shared/constants";
import { CandidateProfile, ProfileField } from "../shared/types/profile.types";

const NAME_PATTERN = /^[A-Za-z\s\-']+$/;
const LOCATION_PATTERN = /^[A-Za-z\s\-,.]+$/;

/**
 * Regex pass over a single message. Only fills fields that are still empty
 * and returns the ones it filled.
 */
export function applyDirectHeuristics(message: string, profile: CandidateProfile): ProfileField[] {
  const changed: ProfileField[] = [];
  const trimmed = message.trim();

  if (!profile.email) {
    const email = parseEmail(message);
    if (email) {
      profile.email = email;
      changed.push("email");
    }
  }

  if (!profile.phone) {
    const phone = parsePhone(message);
    if (phone) {
      profile.phone = phone;
      changed.push("phone");
    }
  }

  if (typeof profile.yearsExperience !== "number") {
    const years = parseYearsOfExperience(message);
    if (years !== null) {
      profile.yearsExperience = years;
      changed.push("yearsExperience");
    }
  }

  if (!profile.fullName && looksLikeShortName(trimmed)) {
    profile.fullName = trimmed;
    changed.push("fullName");
  }

  if (!profile.currentLocation && looksLikeShortLocation(trimmed, profile)) {
    profile.currentLocation = trimmed;
    changed.push("currentLocation");
  }

  return changed;
}

/**
 * Last resort for role answers such as "software tester" that neither the
 * regex pass nor the model captured. Runs only before any name or position
 * is known.
 */
export function applyPositionFallback(message: string, profile: CandidateProfile): boolean {
  if (profile.desiredPositions.length > 0 || profile.fullName) {
    return false;
  }
  const trimmed = message.trim();
  if (!trimmed || trimmed.length >= POSITION_FALLBACK_MAX_LENGTH || !containsJobRoleKeyword(trimmed)) {
    return false;
  }
  profile.desiredPositions.push(trimmed);
  return true;
}

export function containsJobRoleKeyword(text: string): boolean {
  return text
    .toLowerCase()
    .split(/[^a-z]+/)
    .some((word) => JOB_ROLE_KEYWORDS.has(word));
}

export function isShortAnswer(text: string): boolean {
  const tokens = text.split(/\s+/).filter((token) => token.length > 0);
  return tokens.length > 0 && tokens.length <= SHORT_ANSWER_MAX_TOKENS;
}

function looksLikeShortName(text: string): boolean {
  return isShortAnswer(text) && NAME_PATTERN.test(text) && !containsJobRoleKeyword(text);
}

function looksLikeShortLocation(text: string, profile: CandidateProfile): boolean {
  if (!isShortAnswer(text) || !LOCATION_PATTERN.test(text) || containsJobRoleKeyword(text)) {
    return false;
  }
  if (profile.fullName === text) {
    return false;
  }
  const missingOtherThanLocation = getMissingFields(profile).filter((field) => field !== "currentLocation");
  return missingOtherThanLocation.length <= 1;
}
