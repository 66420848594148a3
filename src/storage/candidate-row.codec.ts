import { createEmptyProfile } from "../profiles/candidate-profile";
import { CandidateProfile } from "../shared/types/profile.types";
import { StoredProfileSummary } from "./persistence.gateway";

export interface CandidateRow {
  id: string | number;
  session_id: string;
  full_name: string | null;
  email: string | null;
  phone: string | null;
  years_experience: number | null;
  desired_positions: string | null;
  current_location: string | null;
  tech_stack: string | null;
  created_at: string;
  updated_at: string;
}

export type CandidateRowValues = Omit<CandidateRow, "id" | "created_at" | "updated_at">;

export function encodeCandidateRow(sessionId: string, profile: CandidateProfile): CandidateRowValues {
  return {
    session_id: sessionId,
    full_name: profile.fullName ?? null,
    email: profile.email ?? null,
    phone: profile.phone ?? null,
    years_experience: profile.yearsExperience ?? null,
    desired_positions: JSON.stringify(profile.desiredPositions),
    current_location: profile.currentLocation ?? null,
    tech_stack: JSON.stringify(profile.techStack),
  };
}

export function decodeCandidateRow(row: CandidateRow): StoredProfileSummary {
  const profile = createEmptyProfile();
  if (row.full_name) {
    profile.fullName = row.full_name;
  }
  if (row.email) {
    profile.email = row.email;
  }
  if (row.phone) {
    profile.phone = row.phone;
  }
  if (typeof row.years_experience === "number") {
    profile.yearsExperience = row.years_experience;
  }
  if (row.current_location) {
    profile.currentLocation = row.current_location;
  }
  profile.desiredPositions = decodeList(row.desired_positions);
  profile.techStack = decodeList(row.tech_stack);

  return {
    profileId: String(row.id),
    sessionId: row.session_id,
    profile,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function decodeList(raw: string | null): string[] {
  if (!raw) {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      return [];
    }
    return parsed.filter((item): item is string => typeof item === "string");
  } catch {
    return [];
  }
}
