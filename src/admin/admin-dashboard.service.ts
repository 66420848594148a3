import { Logger } from "../config/logger";
import { isProfileComplete } from "../profiles/candidate-profile";
import { buildExportFileName, renderCandidatesCsv, renderExportJson } from "../storage/export.service";
import {
  EXPORT_PROFILE_LIMIT,
  PersistenceGateway,
  ProfileDetail,
  StoredProfileSummary,
} from "../storage/persistence.gateway";

export interface AdminOverview {
  store: string;
  totalCandidates: number;
  /** Mean over candidates that reported experience, one decimal; null when nobody did. */
  averageExperience: number | null;
  completedProfiles: number;
  createdToday: number;
}

export interface AdminProfileListItem {
  profileId: string;
  sessionId: string;
  fullName?: string;
  email?: string;
  phone?: string;
  yearsExperience?: number;
  desiredPositions: string[];
  techStack: string[];
  complete: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface AdminExportFile {
  fileName: string;
  contentType: string;
  body: string;
}

const DEFAULT_LIST_LIMIT = 100;
const MAX_LIST_LIMIT = 1_000;

export class AdminDashboardService {
  constructor(
    private readonly persistence: PersistenceGateway,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async getOverview(): Promise<AdminOverview> {
    const summaries = await this.persistence.listProfiles(EXPORT_PROFILE_LIMIT);
    const today = this.now().toISOString().slice(0, 10);
    const reported = summaries
      .map((item) => item.profile.yearsExperience)
      .filter((value): value is number => typeof value === "number");
    const averageExperience =
      reported.length > 0
        ? Math.round((reported.reduce((sum, value) => sum + value, 0) / reported.length) * 10) / 10
        : null;

    return {
      store: this.persistence.name,
      totalCandidates: summaries.length,
      averageExperience,
      completedProfiles: summaries.filter((item) => Boolean(item.profile.email && item.profile.phone)).length,
      createdToday: summaries.filter((item) => item.createdAt.startsWith(today)).length,
    };
  }

  async listProfiles(options: { limit?: number; complete?: boolean } = {}): Promise<AdminProfileListItem[]> {
    const limit = clampLimit(options.limit);
    const summaries = await this.persistence.listProfiles(limit);
    const items = summaries.map(toListItem);
    if (typeof options.complete !== "boolean") {
      return items;
    }
    return items.filter((item) => item.complete === options.complete);
  }

  async getProfile(profileId: string): Promise<ProfileDetail | null> {
    return this.persistence.fetchProfileSummary(profileId);
  }

  async exportJson(): Promise<AdminExportFile> {
    const document = await this.persistence.exportAll();
    this.logger.info("admin.export.json", { candidates: document.candidates.length });
    return {
      fileName: buildExportFileName("candidates", "json", this.now()),
      contentType: "application/json; charset=utf-8",
      body: renderExportJson(document),
    };
  }

  async exportCsv(): Promise<AdminExportFile> {
    const summaries = await this.persistence.listProfiles(EXPORT_PROFILE_LIMIT);
    this.logger.info("admin.export.csv", { candidates: summaries.length });
    return {
      fileName: buildExportFileName("candidates", "csv", this.now()),
      contentType: "text/csv; charset=utf-8",
      body: renderCandidatesCsv(summaries),
    };
  }
}

function toListItem(summary: StoredProfileSummary): AdminProfileListItem {
  const { profile } = summary;
  return {
    profileId: summary.profileId,
    sessionId: summary.sessionId,
    fullName: profile.fullName,
    email: profile.email,
    phone: profile.phone,
    yearsExperience: profile.yearsExperience,
    desiredPositions: [...profile.desiredPositions],
    techStack: [...profile.techStack],
    complete: isProfileComplete(profile),
    createdAt: summary.createdAt,
    updatedAt: summary.updatedAt,
  };
}

function clampLimit(limit: number | undefined): number {
  if (typeof limit !== "number" || !Number.isInteger(limit) || limit <= 0) {
    return DEFAULT_LIST_LIMIT;
  }
  return Math.min(limit, MAX_LIST_LIMIT);
}
