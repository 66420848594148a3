import { Logger } from "../config/logger";
import { TranscriptRole } from "../shared/types/intake.types";
import { CandidateProfile } from "../shared/types/profile.types";
import { CandidateRow, decodeCandidateRow, encodeCandidateRow } from "./candidate-row.codec";
import {
  EXPORT_PROFILE_LIMIT,
  ExportDocument,
  PersistenceGateway,
  ProfileDetail,
  StoredProfileSummary,
  StoredTranscriptEntry,
} from "./persistence.gateway";

interface QuestionRecord {
  id: string;
  candidateId: string;
  questionIndex: number;
  question: string;
}

interface AnswerRecord {
  id: string;
  candidateId: string;
  questionId: string;
  answer: string;
  answeredAt: string;
}

/** Process-local store with the same row encoding as the database tables. */
export class InMemoryPersistenceGateway implements PersistenceGateway {
  readonly name = "memory";
  private readonly candidates = new Map<string, CandidateRow>();
  private readonly questions: QuestionRecord[] = [];
  private readonly answers: AnswerRecord[] = [];
  private readonly logs = new Map<string, StoredTranscriptEntry[]>();
  private nextId = 1;

  constructor(
    private readonly logger?: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async createOrUpdateProfile(sessionId: string, profile: CandidateProfile): Promise<string> {
    const values = encodeCandidateRow(sessionId, profile);
    const timestamp = this.timestamp();
    for (const row of this.candidates.values()) {
      if (row.session_id === sessionId) {
        Object.assign(row, values, { updated_at: timestamp });
        return String(row.id);
      }
    }
    const id = this.allocateId();
    this.candidates.set(id, { id, ...values, created_at: timestamp, updated_at: timestamp });
    return id;
  }

  async saveQuestionSet(profileId: string, questions: ReadonlyArray<string>): Promise<string[]> {
    return questions.map((question, questionIndex) => {
      const id = this.allocateId();
      this.questions.push({ id, candidateId: profileId, questionIndex, question });
      return id;
    });
  }

  async saveAnswer(profileId: string, questionIndex: number, answerText: string): Promise<string | null> {
    const question = this.questions.find(
      (record) => record.candidateId === profileId && record.questionIndex === questionIndex,
    );
    if (!question) {
      this.logger?.warn("persistence.answer.question_missing", { profileId, questionIndex });
      return null;
    }
    const id = this.allocateId();
    this.answers.push({
      id,
      candidateId: profileId,
      questionId: question.id,
      answer: answerText,
      answeredAt: this.timestamp(),
    });
    return id;
  }

  async appendTranscript(profileId: string, role: TranscriptRole, content: string): Promise<void> {
    const entries = this.logs.get(profileId) ?? [];
    entries.push({ role, content, timestamp: this.timestamp() });
    this.logs.set(profileId, entries);
  }

  async fetchProfileSummary(profileId: string): Promise<ProfileDetail | null> {
    const row = this.candidates.get(profileId);
    if (!row) {
      return null;
    }
    const questions = this.questions
      .filter((record) => record.candidateId === profileId)
      .sort((a, b) => a.questionIndex - b.questionIndex)
      .map((record) => {
        const answer = this.answers.filter((item) => item.questionId === record.id).pop();
        return {
          questionId: record.id,
          questionIndex: record.questionIndex,
          question: record.question,
          answer: answer?.answer ?? null,
          answeredAt: answer?.answeredAt ?? null,
        };
      });
    return {
      summary: decodeCandidateRow(row),
      questions,
      transcript: [...(this.logs.get(profileId) ?? [])],
    };
  }

  async listProfiles(limit: number): Promise<StoredProfileSummary[]> {
    return Array.from(this.candidates.values())
      .reverse()
      .slice(0, Math.max(0, limit))
      .map(decodeCandidateRow);
  }

  async exportAll(): Promise<ExportDocument> {
    const summaries = await this.listProfiles(EXPORT_PROFILE_LIMIT);
    const candidates: ProfileDetail[] = [];
    for (const summary of summaries) {
      const detail = await this.fetchProfileSummary(summary.profileId);
      if (detail) {
        candidates.push(detail);
      }
    }
    return { exportedAt: this.timestamp(), candidates };
  }

  private allocateId(): string {
    const id = String(this.nextId);
    this.nextId += 1;
    return id;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
