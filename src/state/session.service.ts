import { randomUUID } from "node:crypto";
import { LanguageCode } from "../i18n/language.service";
import { createEmptyProfile } from "../profiles/candidate-profile";
import {
  ConversationPhase,
  IntakeSession,
  TechnicalQuestionsState,
  TranscriptRole,
} from "../shared/types/intake.types";
import { assertTransition } from "./state-machine";

export interface SessionRetention {
  /** How long a completed session stays in memory after its last update. */
  completedTtlMs: number;
  /** How long any other session may sit without a turn. */
  idleTtlMs: number;
}

export const DEFAULT_SESSION_RETENTION: SessionRetention = {
  completedTtlMs: 10 * 60 * 1000,
  idleTtlMs: 24 * 60 * 60 * 1000,
};

export class SessionService {
  private readonly sessions = new Map<string, IntakeSession>();
  private readonly turnQueues = new Map<string, Promise<unknown>>();

  constructor(
    private readonly retention: SessionRetention = DEFAULT_SESSION_RETENTION,
    private readonly now: () => number = Date.now,
  ) {}

  create(language: LanguageCode, sessionId: string = randomUUID()): IntakeSession {
    if (this.sessions.has(sessionId)) {
      throw new Error(`Session already exists: ${sessionId}`);
    }
    const now = this.timestamp();
    const session: IntakeSession = {
      sessionId,
      language,
      phase: "greeting",
      profile: createEmptyProfile(),
      currentQuestionIndex: 0,
      technicalState: { kind: "awaiting_answer" },
      transcript: [],
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(sessionId, session);
    return session;
  }

  getSession(sessionId: string): IntakeSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  getRequiredSession(sessionId: string): IntakeSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  // The turn queue entry is left alone; runExclusive removes it once the chain settles.
  destroy(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Drops sessions past their retention window and returns their ids.
   * Sessions with a queued or running turn are kept until the next sweep.
   */
  sweepExpired(): string[] {
    const now = this.now();
    const expired: string[] = [];
    for (const session of this.sessions.values()) {
      const ttl = session.phase === "completed" ? this.retention.completedTtlMs : this.retention.idleTtlMs;
      const idleMs = now - Date.parse(session.updatedAt);
      if (idleMs >= ttl && !this.turnQueues.has(session.sessionId)) {
        expired.push(session.sessionId);
      }
    }
    for (const sessionId of expired) {
      this.sessions.delete(sessionId);
    }
    return expired;
  }

  transition(sessionId: string, to: ConversationPhase): IntakeSession {
    const session = this.getRequiredSession(sessionId);
    assertTransition(session.phase, to);
    session.phase = to;
    return this.touch(session);
  }

  setLanguage(sessionId: string, language: LanguageCode): IntakeSession {
    const session = this.getRequiredSession(sessionId);
    session.language = language;
    return this.touch(session);
  }

  setProfileId(sessionId: string, profileId: string): IntakeSession {
    const session = this.getRequiredSession(sessionId);
    session.profileId = profileId;
    return this.touch(session);
  }

  setTechnicalQuestions(sessionId: string, questions: ReadonlyArray<string>): IntakeSession {
    const session = this.getRequiredSession(sessionId);
    if (session.technicalQuestions) {
      throw new Error("Technical questions are immutable and cannot be regenerated in this session.");
    }
    session.technicalQuestions = Object.freeze([...questions]);
    session.currentQuestionIndex = 0;
    session.technicalState = { kind: "awaiting_answer" };
    return this.touch(session);
  }

  advanceQuestion(sessionId: string): IntakeSession {
    const session = this.getRequiredSession(sessionId);
    session.currentQuestionIndex += 1;
    return this.touch(session);
  }

  setTechnicalState(sessionId: string, state: TechnicalQuestionsState): IntakeSession {
    const session = this.getRequiredSession(sessionId);
    session.technicalState = state;
    return this.touch(session);
  }

  appendTranscript(sessionId: string, role: TranscriptRole, content: string): IntakeSession {
    const session = this.getRequiredSession(sessionId);
    session.transcript.push({ role, content, timestamp: this.timestamp() });
    return this.touch(session);
  }

  /**
   * Runs `task` after every earlier task queued for the same session has
   * settled, so two deliveries for one session never interleave.
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.turnQueues.get(sessionId) ?? Promise.resolve();
    const next = previous.then(task, task);
    const settled = next.catch(() => undefined);
    this.turnQueues.set(sessionId, settled);
    void settled.then(() => {
      if (this.turnQueues.get(sessionId) === settled) {
        this.turnQueues.delete(sessionId);
      }
    });
    return next;
  }

  private touch(session: IntakeSession): IntakeSession {
    session.updatedAt = this.timestamp();
    return session;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}
