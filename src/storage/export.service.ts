import { ExportDocument, StoredProfileSummary } from "./persistence.gateway";

const CSV_COLUMNS = [
  "id",
  "session_id",
  "full_name",
  "email",
  "phone",
  "years_experience",
  "desired_positions",
  "current_location",
  "tech_stack",
  "created_at",
  "updated_at",
] as const;

export function renderExportJson(document: ExportDocument): string {
  return JSON.stringify(document, null, 2);
}

/** One row per candidate; list fields are joined with "; ". */
export function renderCandidatesCsv(summaries: ReadonlyArray<StoredProfileSummary>): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const summary of summaries) {
    const { profile } = summary;
    const cells = [
      summary.profileId,
      summary.sessionId,
      profile.fullName ?? "",
      profile.email ?? "",
      profile.phone ?? "",
      typeof profile.yearsExperience === "number" ? String(profile.yearsExperience) : "",
      profile.desiredPositions.join("; "),
      profile.currentLocation ?? "",
      profile.techStack.join("; "),
      summary.createdAt,
      summary.updatedAt,
    ];
    lines.push(cells.map(escapeCsvCell).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function buildExportFileName(prefix: string, extension: "json" | "csv", now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
  return `${prefix}_${stamp}.${extension}`;
}

function escapeCsvCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, "\"\"")}"`;
  }
  return value;
}
