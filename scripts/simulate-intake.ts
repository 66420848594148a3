import { ChatCompletionClient, ChatMessage, CompletionOptions } from "../src/ai/llm.client";
import { createLogger } from "../src/config/logger";
import { IntakeEngine } from "../src/intake/intake.engine";
import { LlmExtractorService } from "../src/intake/llm-extractor.service";
import { TechnicalQuestionsService } from "../src/intake/technical-questions.service";
import { SessionService } from "../src/state/session.service";
import { InMemoryPersistenceGateway } from "../src/storage/in-memory.gateway";

/** Answers each prompt from a canned queue so the flow runs without a model key. */
class CannedModelClient implements ChatCompletionClient {
  public callCount = 0;

  private readonly replies: Record<string, string[]> = {
    profile_extraction_v1: [
      "{}",
      "{}",
      JSON.stringify({ desired_positions: ["Backend Engineer"], tech_stack: ["TypeScript", "PostgreSQL"] }),
    ],
    next_question_v1: [
      "Nice to meet you, Alex! Could you share your email address and phone number?",
      "How many years of professional experience do you have?",
    ],
    technical_questions_v1: [
      JSON.stringify([
        "How do you keep a PostgreSQL migration safe on a busy table?",
        "How does TypeScript narrow a discriminated union?",
        "How would you trace a slow endpoint in production?",
      ]),
    ],
  };

  getModelName(): string {
    return "canned";
  }

  async complete(_messages: ReadonlyArray<ChatMessage>, options?: CompletionOptions): Promise<string> {
    this.callCount += 1;
    const queue = this.replies[options?.promptName ?? ""] ?? [];
    const next = queue.shift();
    if (next === undefined) {
      throw new Error(`No canned reply left for ${options?.promptName ?? "unnamed prompt"}`);
    }
    return next;
  }
}

const CANDIDATE_TURNS = [
  "Alex Morgan",
  "alex.morgan@example.com, +1 555 010 2030",
  "I have 7 years of experience building backend services in TypeScript with PostgreSQL",
  "Lisbon",
  "Add the column as nullable first, backfill in batches, then add the constraint.",
  "I want to update my location",
  "Porto",
  "It checks the literal tag and narrows the type in each branch.",
  "Start from the traces, then look at query plans for the slowest spans.",
];

async function run(): Promise<void> {
  const logger = createLogger({ minLevel: "warn" });
  const model = new CannedModelClient();
  const persistence = new InMemoryPersistenceGateway(logger);
  const engine = new IntakeEngine(
    new SessionService(),
    new LlmExtractorService(model, logger),
    new TechnicalQuestionsService(model, logger),
    model,
    persistence,
    logger,
  );

  const started = await engine.startSession("en", "simulated-session");
  printTurn("assistant", started.reply);

  for (const text of CANDIDATE_TURNS) {
    printTurn("candidate", text);
    const result = await engine.handleMessage(started.session.sessionId, text);
    printTurn(`assistant (${result.phase}, ${result.progress}%)`, result.reply);
  }

  const snapshot = engine.getSnapshot(started.session.sessionId);
  assert(snapshot?.phase === "completed", "conversation did not reach completed");
  assert(snapshot?.profile.currentLocation === "Porto", "location update was not applied");

  const stored = await persistence.listProfiles(1);
  const detail = stored[0] ? await persistence.fetchProfileSummary(stored[0].profileId) : null;
  const answered = detail?.questions.filter((question) => question.answer !== null).length ?? 0;
  assert(answered === 3, `expected 3 stored answers, got ${answered}`);

  process.stdout.write(`\nsimulate-intake ok: ${model.callCount} model calls, ${answered} answers stored\n`);
}

function printTurn(speaker: string, text: string): void {
  process.stdout.write(`\n[${speaker}]\n${text}\n`);
}

function assert(condition: unknown, message: string): void {
  if (!condition) {
    throw new Error(`simulate-intake failed, ${message}`);
  }
}

run().catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
