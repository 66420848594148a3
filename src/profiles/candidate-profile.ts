import {
  CandidateProfile,
  ExtractedProfileFields,
  ProfileField,
  ProfileListField,
  ProfileTextField,
} from "../shared/types/profile.types";

export const PROFILE_FIELD_ORDER: ReadonlyArray<ProfileField> = [
  "fullName",
  "email",
  "phone",
  "yearsExperience",
  "desiredPositions",
  "currentLocation",
  "techStack",
];

export const PROFILE_FIELD_LABELS: Readonly<Record<ProfileField, string>> = {
  fullName: "full name",
  email: "email address",
  phone: "phone number",
  yearsExperience: "years of experience",
  desiredPositions: "desired position(s)",
  currentLocation: "current location",
  techStack: "tech stack",
};

const TEXT_FIELDS: ReadonlyArray<ProfileTextField> = ["fullName", "email", "phone", "currentLocation"];
const LIST_FIELDS: ReadonlyArray<ProfileListField> = ["desiredPositions", "techStack"];

export function createEmptyProfile(): CandidateProfile {
  return {
    desiredPositions: [],
    techStack: [],
  };
}

export function cloneProfile(profile: CandidateProfile): CandidateProfile {
  return {
    ...profile,
    desiredPositions: [...profile.desiredPositions],
    techStack: [...profile.techStack],
  };
}

export function isFieldPopulated(profile: CandidateProfile, field: ProfileField): boolean {
  if (field === "desiredPositions" || field === "techStack") {
    return profile[field].length > 0;
  }
  if (field === "yearsExperience") {
    return typeof profile.yearsExperience === "number";
  }
  return hasText(profile[field]);
}

export function getMissingFields(profile: CandidateProfile): ProfileField[] {
  return PROFILE_FIELD_ORDER.filter((field) => !isFieldPopulated(profile, field));
}

export function isProfileComplete(profile: CandidateProfile): boolean {
  return getMissingFields(profile).length === 0;
}

/** Share of populated fields, as a whole percentage. */
export function calculateProfileProgress(profile: CandidateProfile): number {
  const populated = PROFILE_FIELD_ORDER.length - getMissingFields(profile).length;
  return Math.round((populated / PROFILE_FIELD_ORDER.length) * 100);
}

/**
 * Applies extracted values without overwriting anything already captured.
 * Returns the fields that changed.
 */
export function mergeExtractedFields(
  profile: CandidateProfile,
  extracted: ExtractedProfileFields,
): ProfileField[] {
  const changed: ProfileField[] = [];
  for (const field of TEXT_FIELDS) {
    const value = normalizeText(extracted[field]);
    if (value && !hasText(profile[field])) {
      profile[field] = value;
      changed.push(field);
    }
  }
  if (typeof extracted.yearsExperience === "number" && typeof profile.yearsExperience !== "number") {
    profile.yearsExperience = extracted.yearsExperience;
    changed.push("yearsExperience");
  }
  for (const field of LIST_FIELDS) {
    if (appendUnique(profile[field], extracted[field] ?? []) > 0) {
      changed.push(field);
    }
  }
  return changed;
}

/**
 * Correction variant used while the candidate explicitly updates their data:
 * scalar values replace what is stored, list values are appended.
 */
export function overwriteExtractedFields(
  profile: CandidateProfile,
  extracted: ExtractedProfileFields,
): ProfileField[] {
  const changed: ProfileField[] = [];
  for (const field of TEXT_FIELDS) {
    const value = normalizeText(extracted[field]);
    if (value && value !== profile[field]) {
      profile[field] = value;
      changed.push(field);
    }
  }
  if (typeof extracted.yearsExperience === "number" && extracted.yearsExperience !== profile.yearsExperience) {
    profile.yearsExperience = extracted.yearsExperience;
    changed.push("yearsExperience");
  }
  for (const field of LIST_FIELDS) {
    if (appendUnique(profile[field], extracted[field] ?? []) > 0) {
      changed.push(field);
    }
  }
  return changed;
}

/** Appends values that are not already present, ignoring case. Returns the number added. */
export function appendUnique(target: string[], values: ReadonlyArray<string>): number {
  const seen = new Set(target.map((item) => item.toLowerCase()));
  let added = 0;
  for (const raw of values) {
    const value = raw.trim();
    const key = value.toLowerCase();
    if (!value || seen.has(key)) {
      continue;
    }
    seen.add(key);
    target.push(value);
    added += 1;
  }
  return added;
}

function hasText(value: string | undefined): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

function normalizeText(value: string | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
