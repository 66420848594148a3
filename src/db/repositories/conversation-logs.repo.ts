import { Logger } from "../../config/logger";
import { TranscriptRole } from "../../shared/types/intake.types";
import { StoredTranscriptEntry } from "../../storage/persistence.gateway";
import { SupabaseRestClient } from "../supabase.client";

const CONVERSATION_LOGS_TABLE = "conversation_logs";

interface ConversationLogRow {
  role: string;
  content: string;
  timestamp: string;
}

export class ConversationLogsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient: SupabaseRestClient,
  ) {}

  async append(candidateId: string, role: TranscriptRole, content: string): Promise<void> {
    await this.supabaseClient.insert(CONVERSATION_LOGS_TABLE, {
      candidate_id: candidateId,
      role,
      content,
      timestamp: new Date().toISOString(),
    });
    this.logger.debug("Conversation log persisted in Supabase", { candidateId, role });
  }

  async listByCandidate(candidateId: string): Promise<StoredTranscriptEntry[]> {
    const rows = await this.supabaseClient.selectMany<ConversationLogRow>(
      CONVERSATION_LOGS_TABLE,
      { candidate_id: candidateId },
      { columns: "role,content,timestamp", orderBy: { column: "timestamp" } },
    );
    return rows.map((row) => ({
      role: row.role === "assistant" ? "assistant" : "user",
      content: row.content,
      timestamp: row.timestamp,
    }));
  }
}
