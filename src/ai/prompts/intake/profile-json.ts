import { CandidateProfile } from "../../../shared/types/profile.types";

export interface ProfileJson {
  full_name: string | null;
  email: string | null;
  phone: string | null;
  years_experience: number | null;
  desired_positions: string[];
  current_location: string | null;
  tech_stack: string[];
}

export function toProfileJson(profile: CandidateProfile): ProfileJson {
  return {
    full_name: profile.fullName ?? null,
    email: profile.email ?? null,
    phone: profile.phone ?? null,
    years_experience: profile.yearsExperience ?? null,
    desired_positions: [...profile.desiredPositions],
    current_location: profile.currentLocation ?? null,
    tech_stack: [...profile.techStack],
  };
}
