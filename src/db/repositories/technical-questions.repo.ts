import { Logger } from "../../config/logger";
import { StoredQuestion } from "../../storage/persistence.gateway";
import { SupabaseRestClient } from "../supabase.client";

const QUESTIONS_TABLE = "technical_questions";
const ANSWERS_TABLE = "technical_answers";

interface TechnicalQuestionRow {
  id: string | number;
  candidate_id: string | number;
  question_index: number;
  question: string;
}

interface TechnicalAnswerRow {
  id: string | number;
  question_id: string | number;
  answer: string;
  answered_at: string;
}

export class TechnicalQuestionsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient: SupabaseRestClient,
  ) {}

  async insertQuestions(candidateId: string, questions: ReadonlyArray<string>): Promise<string[]> {
    if (!questions.length) {
      return [];
    }
    const rows = await this.supabaseClient.insertReturning<TechnicalQuestionRow>(
      QUESTIONS_TABLE,
      questions.map((question, index) => ({
        candidate_id: candidateId,
        question_index: index,
        question,
      })),
    );
    this.logger.debug("Technical questions persisted in Supabase", { candidateId, count: rows.length });
    return rows
      .slice()
      .sort((a, b) => a.question_index - b.question_index)
      .map((row) => String(row.id));
  }

  async findQuestionId(candidateId: string, questionIndex: number): Promise<string | null> {
    const row = await this.supabaseClient.selectOne<TechnicalQuestionRow>(
      QUESTIONS_TABLE,
      { candidate_id: candidateId, question_index: questionIndex },
      "id,candidate_id,question_index,question",
    );
    return row ? String(row.id) : null;
  }

  async insertAnswer(candidateId: string, questionId: string, answer: string): Promise<string> {
    const rows = await this.supabaseClient.insertReturning<TechnicalAnswerRow>(ANSWERS_TABLE, {
      candidate_id: candidateId,
      question_id: questionId,
      answer,
      answered_at: new Date().toISOString(),
    });
    if (!rows.length) {
      throw new Error(`Answer insert returned no row for question ${questionId}`);
    }
    return String(rows[0].id);
  }

  async listWithAnswers(candidateId: string): Promise<StoredQuestion[]> {
    const questions = await this.supabaseClient.selectMany<TechnicalQuestionRow>(
      QUESTIONS_TABLE,
      { candidate_id: candidateId },
      { orderBy: { column: "question_index" } },
    );
    const answers = await this.supabaseClient.selectMany<TechnicalAnswerRow>(
      ANSWERS_TABLE,
      { candidate_id: candidateId },
      { orderBy: { column: "answered_at" } },
    );
    const answersByQuestion = new Map<string, TechnicalAnswerRow>();
    for (const answer of answers) {
      answersByQuestion.set(String(answer.question_id), answer);
    }
    return questions.map((row) => {
      const answer = answersByQuestion.get(String(row.id));
      return {
        questionId: String(row.id),
        questionIndex: row.question_index,
        question: row.question,
        answer: answer?.answer ?? null,
        answeredAt: answer?.answered_at ?? null,
      };
    });
  }
}
