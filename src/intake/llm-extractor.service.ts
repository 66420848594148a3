import { ChatCompletionClient } from "../ai/llm.client";
import { callJsonPromptSafe, isRecord } from "../ai/llm.safe";
import { buildProfileExtractionV1Messages } from "../ai/prompts/intake/profile-extraction.v1.prompt";
import { Logger } from "../config/logger";
import { LanguageCode } from "../i18n/language.service";
import { mergeExtractedFields } from "../profiles/candidate-profile";
import { EXTRACTION_TEMPERATURE } from "../shared/constants";
import { CandidateProfile, ExtractedProfileFields, ProfileField } from "../shared/types/profile.types";

export class LlmExtractorService {
  constructor(
    private readonly llmClient: ChatCompletionClient,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  /** Returns null when the model call fails or its output is unusable. */
  async extract(
    message: string,
    profile: CandidateProfile,
    language: LanguageCode,
  ): Promise<ExtractedProfileFields | null> {
    const safe = await callJsonPromptSafe<Record<string, unknown>>({
      llmClient: this.llmClient,
      logger: this.logger,
      messages: buildProfileExtractionV1Messages({ language, message, profile }),
      temperature: EXTRACTION_TEMPERATURE,
      timeoutMs: this.timeoutMs,
      promptName: "profile_extraction_v1",
      validate: isRecord,
    });
    if (!safe.ok) {
      this.logger.debug("profile.extraction.skipped", { errorCode: safe.error_code });
      return null;
    }
    return parseExtractedFields(safe.data);
  }

  async extractInto(
    message: string,
    profile: CandidateProfile,
    language: LanguageCode,
  ): Promise<ProfileField[]> {
    const extracted = await this.extract(message, profile, language);
    if (!extracted) {
      return [];
    }
    return mergeExtractedFields(profile, extracted);
  }
}

export function parseExtractedFields(data: Record<string, unknown>): ExtractedProfileFields {
  const fields: ExtractedProfileFields = {};
  const fullName = readText(data.full_name);
  const email = readText(data.email);
  const phone = readText(data.phone);
  const currentLocation = readText(data.current_location);
  const yearsExperience = readYears(data.years_experience);
  const desiredPositions = readList(data.desired_positions);
  const techStack = readList(data.tech_stack);

  if (fullName) {
    fields.fullName = fullName;
  }
  if (email) {
    fields.email = email;
  }
  if (phone) {
    fields.phone = phone;
  }
  if (currentLocation) {
    fields.currentLocation = currentLocation;
  }
  if (yearsExperience !== null) {
    fields.yearsExperience = yearsExperience;
  }
  if (desiredPositions.length > 0) {
    fields.desiredPositions = desiredPositions;
  }
  if (techStack.length > 0) {
    fields.techStack = techStack;
  }
  return fields;
}

function readText(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase() === "null") {
    return null;
  }
  return trimmed;
}

function readYears(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : null;
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

function readList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items
    .map((item) => readText(item))
    .filter((item): item is string => item !== null);
}
