import { Logger } from "../config/logger";
import { CandidatesRepository } from "../db/repositories/candidates.repo";
import { ConversationLogsRepository } from "../db/repositories/conversation-logs.repo";
import { TechnicalQuestionsRepository } from "../db/repositories/technical-questions.repo";
import { SupabaseRestClient } from "../db/supabase.client";
import { TranscriptRole } from "../shared/types/intake.types";
import { CandidateProfile } from "../shared/types/profile.types";
import {
  EXPORT_PROFILE_LIMIT,
  ExportDocument,
  PersistenceGateway,
  ProfileDetail,
  StoredProfileSummary,
} from "./persistence.gateway";

export class SupabasePersistenceGateway implements PersistenceGateway {
  readonly name = "supabase";
  private readonly candidates: CandidatesRepository;
  private readonly questions: TechnicalQuestionsRepository;
  private readonly conversationLogs: ConversationLogsRepository;

  constructor(
    private readonly logger: Logger,
    supabaseClient: SupabaseRestClient,
  ) {
    this.candidates = new CandidatesRepository(logger, supabaseClient);
    this.questions = new TechnicalQuestionsRepository(logger, supabaseClient);
    this.conversationLogs = new ConversationLogsRepository(logger, supabaseClient);
  }

  async createOrUpdateProfile(sessionId: string, profile: CandidateProfile): Promise<string> {
    const stored = await this.candidates.upsertBySessionId(sessionId, profile);
    return stored.profileId;
  }

  async saveQuestionSet(profileId: string, questions: ReadonlyArray<string>): Promise<string[]> {
    return this.questions.insertQuestions(profileId, questions);
  }

  async saveAnswer(profileId: string, questionIndex: number, answerText: string): Promise<string | null> {
    const questionId = await this.questions.findQuestionId(profileId, questionIndex);
    if (!questionId) {
      this.logger.warn("persistence.answer.question_missing", { profileId, questionIndex });
      return null;
    }
    return this.questions.insertAnswer(profileId, questionId, answerText);
  }

  async appendTranscript(profileId: string, role: TranscriptRole, content: string): Promise<void> {
    await this.conversationLogs.append(profileId, role, content);
  }

  async fetchProfileSummary(profileId: string): Promise<ProfileDetail | null> {
    const summary = await this.candidates.findById(profileId);
    if (!summary) {
      return null;
    }
    const [questions, transcript] = await Promise.all([
      this.questions.listWithAnswers(profileId),
      this.conversationLogs.listByCandidate(profileId),
    ]);
    return { summary, questions, transcript };
  }

  async listProfiles(limit: number): Promise<StoredProfileSummary[]> {
    return this.candidates.listRecent(limit);
  }

  async exportAll(): Promise<ExportDocument> {
    const summaries = await this.candidates.listRecent(EXPORT_PROFILE_LIMIT);
    const candidates: ProfileDetail[] = [];
    for (const summary of summaries) {
      const detail = await this.fetchProfileSummary(summary.profileId);
      if (detail) {
        candidates.push(detail);
      }
    }
    return { exportedAt: new Date().toISOString(), candidates };
  }
}
