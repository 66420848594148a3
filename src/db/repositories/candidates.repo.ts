import { Logger } from "../../config/logger";
import { CandidateProfile } from "../../shared/types/profile.types";
import { CandidateRow, decodeCandidateRow, encodeCandidateRow } from "../../storage/candidate-row.codec";
import { StoredProfileSummary } from "../../storage/persistence.gateway";
import { SupabaseRestClient } from "../supabase.client";

const CANDIDATES_TABLE = "candidates";

export class CandidatesRepository {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient: SupabaseRestClient,
  ) {}

  async upsertBySessionId(sessionId: string, profile: CandidateProfile): Promise<StoredProfileSummary> {
    const rows = await this.supabaseClient.upsertReturning<CandidateRow>(
      CANDIDATES_TABLE,
      {
        ...encodeCandidateRow(sessionId, profile),
        updated_at: new Date().toISOString(),
      },
      { onConflict: "session_id" },
    );
    if (!rows.length) {
      throw new Error(`Candidate upsert returned no row for session ${sessionId}`);
    }
    this.logger.debug("Candidate profile persisted in Supabase", { sessionId, profileId: rows[0].id });
    return decodeCandidateRow(rows[0]);
  }

  async findById(profileId: string): Promise<StoredProfileSummary | null> {
    const row = await this.supabaseClient.selectOne<CandidateRow>(CANDIDATES_TABLE, { id: profileId });
    return row ? decodeCandidateRow(row) : null;
  }

  async listRecent(limit: number): Promise<StoredProfileSummary[]> {
    const rows = await this.supabaseClient.selectMany<CandidateRow>(
      CANDIDATES_TABLE,
      {},
      { orderBy: { column: "created_at", ascending: false }, limit },
    );
    return rows.map(decodeCandidateRow);
  }
}
