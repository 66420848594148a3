export interface CandidateProfile {
  fullName?: string;
  email?: string;
  phone?: string;
  yearsExperience?: number;
  desiredPositions: string[];
  currentLocation?: string;
  techStack: string[];
}

export type ProfileField =
  | "fullName"
  | "email"
  | "phone"
  | "yearsExperience"
  | "desiredPositions"
  | "currentLocation"
  | "techStack";

export type ProfileListField = "desiredPositions" | "techStack";
export type ProfileTextField = "fullName" | "email" | "phone" | "currentLocation";

/**
 * Partial profile values produced by one extraction pass. Lists may be
 * empty; scalars are absent when nothing was found.
 */
export interface ExtractedProfileFields {
  fullName?: string;
  email?: string;
  phone?: string;
  yearsExperience?: number;
  desiredPositions?: string[];
  currentLocation?: string;
  techStack?: string[];
}
