import { LanguageCode } from "../../i18n/language.service";
import { CandidateProfile } from "./profile.types";

export type ConversationPhase = "greeting" | "info_gathering" | "technical_questions" | "completed";

export type UpdatableField = "location" | "email" | "phone";

export type TechnicalQuestionsState =
  | { kind: "awaiting_answer" }
  | { kind: "awaiting_update_value"; field: UpdatableField | null };

export type TranscriptRole = "user" | "assistant";

export interface TranscriptEntry {
  role: TranscriptRole;
  content: string;
  timestamp: string;
}

export interface IntakeSession {
  sessionId: string;
  language: LanguageCode;
  phase: ConversationPhase;
  profile: CandidateProfile;
  profileId?: string;
  technicalQuestions?: ReadonlyArray<string>;
  currentQuestionIndex: number;
  technicalState: TechnicalQuestionsState;
  transcript: TranscriptEntry[];
  createdAt: string;
  updatedAt: string;
}

export interface IntakeTurnResult {
  reply: string;
  phase: ConversationPhase;
  progress: number;
  ended: boolean;
}

export interface IntakeSessionSnapshot {
  sessionId: string;
  language: LanguageCode;
  phase: ConversationPhase;
  profile: CandidateProfile;
  progress: number;
  currentQuestionIndex: number;
  totalQuestions: number;
  awaitingUpdate: boolean;
}
