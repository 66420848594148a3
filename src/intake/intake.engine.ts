import { ChatCompletionClient } from "../ai/llm.client";
import { callTextPromptSafe } from "../ai/llm.safe";
import { buildNextQuestionV1Messages } from "../ai/prompts/intake/next-question.v1.prompt";
import { errorMessage, Logger, logContext } from "../config/logger";
import {
  formatQuestionHeader,
  formatTechnicalIntro,
  LanguageCode,
  MessageKey,
  translate,
} from "../i18n/language.service";
import {
  calculateProfileProgress,
  cloneProfile,
  createEmptyProfile,
  getMissingFields,
  isProfileComplete,
  overwriteExtractedFields,
} from "../profiles/candidate-profile";
import { parseEmail, parsePhone, parseYearsOfExperience } from "../profiles/parsers/contact.parser";
import {
  IntakeSession,
  IntakeSessionSnapshot,
  IntakeTurnResult,
  UpdatableField,
} from "../shared/types/intake.types";
import { ExtractedProfileFields, ProfileField } from "../shared/types/profile.types";
import { SessionService } from "../state/session.service";
import { PersistenceGateway } from "../storage/persistence.gateway";
import { SpeechOutput } from "../voice/voice-output.queue";
import { applyDirectHeuristics, applyPositionFallback } from "./heuristic-extractor";
import { detectUpdateField, isEndOfConversation, isUpdateIntent } from "./intent-detection";
import { LlmExtractorService } from "./llm-extractor.service";
import { buildProfileSummary } from "./profile-summary";
import { TechnicalQuestionsService } from "./technical-questions.service";

const NEXT_QUESTION_KEYS: Readonly<Record<ProfileField, MessageKey>> = {
  fullName: "next_name",
  email: "next_email",
  phone: "next_phone",
  yearsExperience: "next_experience",
  desiredPositions: "next_position",
  currentLocation: "next_location",
  techStack: "next_tech_stack",
};

const UPDATE_PROMPT_KEYS: Readonly<Record<UpdatableField, MessageKey>> = {
  location: "update_location",
  email: "update_email",
  phone: "update_phone",
};

export interface IntakeEngineOptions {
  voice?: SpeechOutput;
  llmTimeoutMs?: number;
  conversationTemperature?: number;
}

export interface StartedSession {
  reply: string;
  session: IntakeSessionSnapshot;
}

export class IntakeEngine {
  constructor(
    private readonly sessionService: SessionService,
    private readonly llmExtractor: LlmExtractorService,
    private readonly technicalQuestionsService: TechnicalQuestionsService,
    private readonly llmClient: ChatCompletionClient,
    private readonly persistence: PersistenceGateway,
    private readonly logger: Logger,
    private readonly options: IntakeEngineOptions = {},
  ) {}

  async startSession(language: LanguageCode, sessionId?: string): Promise<StartedSession> {
    const session = this.sessionService.create(language, sessionId);
    logContext(this.logger, "info", "intake.session.started", {
      session_id: session.sessionId,
      language,
      phase: session.phase,
    });
    await this.persistProfile(session);
    const greeting = translate(language, "greeting");
    await this.recordAssistantMessage(session, greeting);
    return { reply: greeting, session: this.toSnapshot(session) };
  }

  getSnapshot(sessionId: string): IntakeSessionSnapshot | null {
    const session = this.sessionService.getSession(sessionId);
    return session ? this.toSnapshot(session) : null;
  }

  hasSession(sessionId: string): boolean {
    return this.sessionService.getSession(sessionId) !== null;
  }

  /** Waits for any turn in flight on the session, then destroys it. */
  async resetSession(sessionId: string): Promise<boolean> {
    return this.sessionService.runExclusive(sessionId, async () => {
      const removed = this.sessionService.destroy(sessionId);
      if (removed) {
        logContext(this.logger, "info", "intake.session.reset", { session_id: sessionId });
      }
      return removed;
    });
  }

  /** Evicts completed and idle sessions from memory; their data stays in the store. */
  sweepSessions(): string[] {
    const evicted = this.sessionService.sweepExpired();
    if (evicted.length > 0) {
      this.logger.info("intake.sessions.evicted", { count: evicted.length });
    }
    return evicted;
  }

  /**
   * Switches the conversation language. With `startFresh` the current session
   * is discarded and a new one is started in the new language.
   */
  async changeLanguage(sessionId: string, language: LanguageCode, startFresh: boolean): Promise<StartedSession> {
    if (startFresh) {
      await this.resetSession(sessionId);
      return this.startSession(language);
    }
    return this.sessionService.runExclusive(sessionId, async () => {
      const session = this.sessionService.setLanguage(sessionId, language);
      const reply = this.currentPrompt(session);
      await this.recordAssistantMessage(session, reply);
      return { reply, session: this.toSnapshot(session) };
    });
  }

  async handleMessage(sessionId: string, text: string): Promise<IntakeTurnResult> {
    return this.sessionService.runExclusive(sessionId, async () => {
      const session = this.sessionService.getRequiredSession(sessionId);
      return this.processTurn(session, text.trim());
    });
  }

  private async processTurn(session: IntakeSession, message: string): Promise<IntakeTurnResult> {
    const startedAt = Date.now();
    const phaseBefore = session.phase;
    if (!message) {
      return {
        reply: translate(session.language, "error_processing"),
        phase: session.phase,
        progress: calculateProfileProgress(session.profile),
        ended: session.phase === "completed",
      };
    }
    await this.recordUserMessage(session, message);

    let reply: string;
    if (isEndOfConversation(message)) {
      this.sessionService.transition(session.sessionId, "completed");
      reply = translate(session.language, "farewell");
    } else if (session.phase === "greeting" || session.phase === "info_gathering") {
      reply = await this.handleProfileTurn(session, message);
    } else if (session.phase === "technical_questions") {
      reply = await this.handleTechnicalTurn(session, message);
    } else {
      reply = translate(session.language, "farewell");
    }

    await this.recordAssistantMessage(session, reply);
    logContext(
      this.logger,
      "info",
      "intake.turn.completed",
      {
        session_id: session.sessionId,
        phase: session.phase,
        latency_ms: Date.now() - startedAt,
      },
      { phaseBefore, questionIndex: session.currentQuestionIndex },
    );

    return {
      reply,
      phase: session.phase,
      progress: calculateProfileProgress(session.profile),
      ended: session.phase === "completed",
    };
  }

  private async handleProfileTurn(session: IntakeSession, message: string): Promise<string> {
    const changed = applyDirectHeuristics(message, session.profile);
    if (!isProfileComplete(session.profile)) {
      changed.push(...(await this.llmExtractor.extractInto(message, session.profile, session.language)));
    }
    if (applyPositionFallback(message, session.profile)) {
      changed.push("desiredPositions");
    }
    logContext(this.logger, "debug", "intake.profile.extracted", {
      session_id: session.sessionId,
      phase: session.phase,
    }, { changed });

    await this.persistProfile(session);

    if (isProfileComplete(session.profile)) {
      return this.startTechnicalQuestions(session);
    }
    if (session.phase === "greeting") {
      this.sessionService.transition(session.sessionId, "info_gathering");
    }
    return this.composeNextQuestion(session);
  }

  private async composeNextQuestion(session: IntakeSession): Promise<string> {
    const missing = getMissingFields(session.profile);
    if (missing.length === 1) {
      return translate(session.language, NEXT_QUESTION_KEYS[missing[0]]);
    }
    const safe = await callTextPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      messages: buildNextQuestionV1Messages({
        language: session.language,
        profile: session.profile,
        missingFields: missing,
      }),
      temperature: this.options.conversationTemperature,
      timeoutMs: this.options.llmTimeoutMs,
      promptName: "next_question_v1",
    });
    return safe.ok ? safe.text : translate(session.language, "error_processing");
  }

  private async startTechnicalQuestions(session: IntakeSession): Promise<string> {
    this.sessionService.transition(session.sessionId, "technical_questions");
    const questions = await this.technicalQuestionsService.generate(session.profile, session.language);
    this.sessionService.setTechnicalQuestions(session.sessionId, questions);
    logContext(this.logger, "info", "intake.technical_questions.ready", {
      session_id: session.sessionId,
      phase: session.phase,
    }, { count: questions.length });
    await this.persistQuestionSet(session, questions);

    const intro = formatTechnicalIntro(session.language, session.profile.fullName ?? "", session.profile.techStack);
    return `${intro}\n\n${this.formatCurrentQuestion(session)}`;
  }

  private async handleTechnicalTurn(session: IntakeSession, message: string): Promise<string> {
    const state = session.technicalState;
    if (state.kind === "awaiting_update_value") {
      return this.applyPendingUpdate(session, state.field, message);
    }
    if (isUpdateIntent(message)) {
      return this.beginUpdate(session, message);
    }
    return this.recordAnswer(session, message);
  }

  private async beginUpdate(session: IntakeSession, message: string): Promise<string> {
    const field = detectUpdateField(message);
    const inlineValue = field === "email" ? parseEmail(message) : field === "phone" ? parsePhone(message) : null;
    if (field && inlineValue) {
      this.applyFieldValue(session, field, inlineValue);
      await this.persistProfile(session);
      return this.confirmUpdate(session);
    }
    this.sessionService.setTechnicalState(session.sessionId, { kind: "awaiting_update_value", field });
    logContext(this.logger, "info", "intake.update.requested", {
      session_id: session.sessionId,
      phase: session.phase,
    }, { field });
    return translate(session.language, field ? UPDATE_PROMPT_KEYS[field] : "update_request");
  }

  private async applyPendingUpdate(
    session: IntakeSession,
    field: UpdatableField | null,
    message: string,
  ): Promise<string> {
    if (field === "location") {
      if (message) {
        this.applyFieldValue(session, field, message);
      }
    } else if (field === "email") {
      const email = parseEmail(message);
      if (email) {
        this.applyFieldValue(session, field, email);
      }
    } else if (field === "phone") {
      const phone = parsePhone(message);
      if (phone) {
        this.applyFieldValue(session, field, phone);
      }
    } else {
      const corrections = await this.extractCorrections(session, message);
      const changed = overwriteExtractedFields(session.profile, corrections);
      logContext(this.logger, "info", "intake.update.applied", {
        session_id: session.sessionId,
        phase: session.phase,
      }, { changed });
    }
    this.sessionService.setTechnicalState(session.sessionId, { kind: "awaiting_answer" });
    await this.persistProfile(session);
    return this.confirmUpdate(session);
  }

  private async extractCorrections(session: IntakeSession, message: string): Promise<ExtractedProfileFields> {
    const corrections: ExtractedProfileFields = {};
    const email = parseEmail(message);
    const phone = parsePhone(message);
    const years = parseYearsOfExperience(message);
    if (email) {
      corrections.email = email;
    }
    if (phone) {
      corrections.phone = phone;
    }
    if (years !== null) {
      corrections.yearsExperience = years;
    }
    const extracted = await this.llmExtractor.extract(message, createEmptyProfile(), session.language);
    return { ...(extracted ?? {}), ...corrections };
  }

  private applyFieldValue(session: IntakeSession, field: UpdatableField, value: string): void {
    if (field === "location") {
      session.profile.currentLocation = value;
    } else {
      session.profile[field] = value;
    }
    logContext(this.logger, "info", "intake.update.applied", {
      session_id: session.sessionId,
      phase: session.phase,
    }, { field });
  }

  private confirmUpdate(session: IntakeSession): string {
    return `${translate(session.language, "update_confirmed")}\n\n${this.formatCurrentQuestion(session)}`;
  }

  private async recordAnswer(session: IntakeSession, answer: string): Promise<string> {
    const questions = session.technicalQuestions ?? [];
    await this.persistAnswer(session, session.currentQuestionIndex, answer);
    this.sessionService.advanceQuestion(session.sessionId);

    if (session.currentQuestionIndex < questions.length) {
      return `${translate(session.language, "thank_you_answer")}\n\n${this.formatCurrentQuestion(session)}`;
    }

    this.sessionService.transition(session.sessionId, "completed");
    logContext(this.logger, "info", "intake.session.completed", {
      session_id: session.sessionId,
      profile_id: session.profileId,
      phase: session.phase,
    });
    return `${translate(session.language, "farewell")}\n\n${buildProfileSummary(session.profile, session.language)}`;
  }

  private formatCurrentQuestion(session: IntakeSession): string {
    const questions = session.technicalQuestions ?? [];
    const index = Math.min(session.currentQuestionIndex, Math.max(0, questions.length - 1));
    const header = formatQuestionHeader(session.language, index + 1, questions.length);
    return `**${header}**\n${questions[index] ?? ""}`;
  }

  private currentPrompt(session: IntakeSession): string {
    if (session.phase === "greeting") {
      return translate(session.language, "greeting");
    }
    if (session.phase === "info_gathering") {
      const missing = getMissingFields(session.profile);
      return missing.length > 0
        ? translate(session.language, NEXT_QUESTION_KEYS[missing[0]])
        : translate(session.language, "error_processing");
    }
    if (session.phase === "technical_questions") {
      return this.formatCurrentQuestion(session);
    }
    return translate(session.language, "farewell");
  }

  private toSnapshot(session: IntakeSession): IntakeSessionSnapshot {
    return {
      sessionId: session.sessionId,
      language: session.language,
      phase: session.phase,
      profile: cloneProfile(session.profile),
      progress: calculateProfileProgress(session.profile),
      currentQuestionIndex: session.currentQuestionIndex,
      totalQuestions: session.technicalQuestions?.length ?? 0,
      awaitingUpdate: session.technicalState.kind === "awaiting_update_value",
    };
  }

  private async recordUserMessage(session: IntakeSession, content: string): Promise<void> {
    this.sessionService.appendTranscript(session.sessionId, "user", content);
    await this.persistTranscript(session, "user", content);
  }

  private async recordAssistantMessage(session: IntakeSession, content: string): Promise<void> {
    this.sessionService.appendTranscript(session.sessionId, "assistant", content);
    await this.persistTranscript(session, "assistant", content);
    this.options.voice?.speak(session.sessionId, content);
  }

  private async persistProfile(session: IntakeSession): Promise<void> {
    try {
      const profileId = await this.persistence.createOrUpdateProfile(session.sessionId, session.profile);
      this.sessionService.setProfileId(session.sessionId, profileId);
    } catch (error) {
      this.logPersistenceFailure(session, "persistence.profile.failed", error);
    }
  }

  private async persistQuestionSet(session: IntakeSession, questions: ReadonlyArray<string>): Promise<void> {
    if (!session.profileId) {
      return;
    }
    try {
      await this.persistence.saveQuestionSet(session.profileId, questions);
    } catch (error) {
      this.logPersistenceFailure(session, "persistence.questions.failed", error);
    }
  }

  private async persistAnswer(session: IntakeSession, questionIndex: number, answer: string): Promise<void> {
    if (!session.profileId) {
      return;
    }
    try {
      await this.persistence.saveAnswer(session.profileId, questionIndex, answer);
    } catch (error) {
      this.logPersistenceFailure(session, "persistence.answer.failed", error);
    }
  }

  private async persistTranscript(
    session: IntakeSession,
    role: "user" | "assistant",
    content: string,
  ): Promise<void> {
    if (!session.profileId) {
      return;
    }
    try {
      await this.persistence.appendTranscript(session.profileId, role, content);
    } catch (error) {
      this.logPersistenceFailure(session, "persistence.transcript.failed", error);
    }
  }

  private logPersistenceFailure(session: IntakeSession, message: string, error: unknown): void {
    logContext(this.logger, "warn", message, {
      session_id: session.sessionId,
      profile_id: session.profileId,
      phase: session.phase,
    }, { store: this.persistence.name, error: errorMessage(error) });
  }
}
