import { ChatCompletionClient } from "../ai/llm.client";
import { callJsonPromptSafe, isRecord } from "../ai/llm.safe";
import { buildTechnicalQuestionsV1Messages } from "../ai/prompts/intake/technical-questions.v1.prompt";
import { Logger } from "../config/logger";
import { LanguageCode, translate } from "../i18n/language.service";
import { MAX_TECHNICAL_QUESTIONS, QUESTION_GENERATION_TEMPERATURE } from "../shared/constants";
import { CandidateProfile } from "../shared/types/profile.types";

export class TechnicalQuestionsService {
  constructor(
    private readonly llmClient: ChatCompletionClient,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  async generate(profile: CandidateProfile, language: LanguageCode): Promise<ReadonlyArray<string>> {
    const safe = await callJsonPromptSafe<unknown>({
      llmClient: this.llmClient,
      logger: this.logger,
      messages: buildTechnicalQuestionsV1Messages({
        language,
        techStack: profile.techStack,
        yearsExperience: profile.yearsExperience ?? 0,
      }),
      temperature: QUESTION_GENERATION_TEMPERATURE,
      timeoutMs: this.timeoutMs,
      promptName: "technical_questions_v1",
      shape: "value",
      validate: isPresent,
    });

    const questions = safe.ok ? parseQuestionList(safe.data) : [];
    if (questions.length === 0) {
      this.logger.warn("technical_questions.fallback_used", {
        errorCode: safe.ok ? "empty_question_list" : safe.error_code,
      });
      return Object.freeze(buildFallbackQuestions(profile, language));
    }
    return Object.freeze(questions.slice(0, MAX_TECHNICAL_QUESTIONS));
  }
}

/** Accepts a bare array or an object carrying `questions`; items are strings or `{ question }`. */
export function parseQuestionList(value: unknown): string[] {
  const source = isRecord(value) ? value.questions : value;
  if (!Array.isArray(source)) {
    return [];
  }
  const questions: string[] = [];
  for (const item of source) {
    const text = typeof item === "string" ? item : isRecord(item) ? item.question : null;
    if (typeof text === "string" && text.trim()) {
      questions.push(text.trim());
    }
  }
  return questions;
}

export function buildFallbackQuestions(profile: CandidateProfile, language: LanguageCode): string[] {
  const technology =
    profile.techStack.length > 0 ? profile.techStack[0] : translate(language, "primary_technology");
  return [
    translate(language, "fallback_question_experience", { technology }),
    translate(language, "fallback_question_challenge"),
    translate(language, "fallback_question_learning"),
  ];
}

function isPresent(value: unknown): value is unknown {
  return value !== null && value !== undefined;
}
