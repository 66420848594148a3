import { TranscriptRole } from "../shared/types/intake.types";
import { CandidateProfile } from "../shared/types/profile.types";

export interface StoredProfileSummary {
  profileId: string;
  sessionId: string;
  profile: CandidateProfile;
  createdAt: string;
  updatedAt: string;
}

export interface StoredQuestion {
  questionId: string;
  questionIndex: number;
  question: string;
  answer: string | null;
  answeredAt: string | null;
}

export interface StoredTranscriptEntry {
  role: TranscriptRole;
  content: string;
  timestamp: string;
}

export interface ProfileDetail {
  summary: StoredProfileSummary;
  questions: StoredQuestion[];
  transcript: StoredTranscriptEntry[];
}

export interface ExportDocument {
  exportedAt: string;
  candidates: ProfileDetail[];
}

/**
 * Read/write contract of the relational store. Implementations encode list
 * fields as JSON text and decode them on read.
 */
export interface PersistenceGateway {
  readonly name: string;
  createOrUpdateProfile(sessionId: string, profile: CandidateProfile): Promise<string>;
  saveQuestionSet(profileId: string, questions: ReadonlyArray<string>): Promise<string[]>;
  /** Resolves to null when no question row exists at that index. */
  saveAnswer(profileId: string, questionIndex: number, answerText: string): Promise<string | null>;
  appendTranscript(profileId: string, role: TranscriptRole, content: string): Promise<void>;
  fetchProfileSummary(profileId: string): Promise<ProfileDetail | null>;
  /** Newest first. */
  listProfiles(limit: number): Promise<StoredProfileSummary[]>;
  exportAll(): Promise<ExportDocument>;
}

export const EXPORT_PROFILE_LIMIT = 10_000;
