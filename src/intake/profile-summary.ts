import { LanguageCode, translate } from "../i18n/language.service";
import { CandidateProfile } from "../shared/types/profile.types";

export function buildProfileSummary(
  profile: CandidateProfile,
  language: LanguageCode,
  completedAt: Date = new Date(),
): string {
  const notCollected = translate(language, "not_collected");
  const show = (value: string | undefined): string => (value && value.trim() ? value : notCollected);
  const list = (values: ReadonlyArray<string>): string => (values.length > 0 ? values.join(", ") : notCollected);
  const experience =
    typeof profile.yearsExperience === "number"
      ? `${profile.yearsExperience} ${translate(language, "years")}`
      : notCollected;

  return [
    `**${translate(language, "candidate_summary")}**`,
    "",
    `**${translate(language, "personal_info")}**`,
    `${translate(language, "name")}: ${show(profile.fullName)}`,
    `${translate(language, "email")}: ${show(profile.email)}`,
    `${translate(language, "phone")}: ${show(profile.phone)}`,
    `${translate(language, "location")}: ${show(profile.currentLocation)}`,
    "",
    `**${translate(language, "professional_details")}**`,
    `${translate(language, "experience")}: ${experience}`,
    `${translate(language, "positions")}: ${list(profile.desiredPositions)}`,
    "",
    `**${translate(language, "technical_skills")}**`,
    `${translate(language, "tech_stack")}: ${list(profile.techStack)}`,
    "",
    `${translate(language, "screening_completed")} ${completedAt.toISOString().slice(0, 16).replace("T", " ")}`,
  ].join("\n");
}
