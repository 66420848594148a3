import { LanguageCode, translate } from "../../../i18n/language.service";
import { PROFILE_FIELD_LABELS } from "../../../profiles/candidate-profile";
import { CandidateProfile, ProfileField } from "../../../shared/types/profile.types";
import { ChatMessage } from "../../llm.client";
import { toProfileJson } from "./profile-json";

export function buildNextQuestionV1Messages(input: {
  language: LanguageCode;
  profile: CandidateProfile;
  missingFields: ReadonlyArray<ProfileField>;
}): ChatMessage[] {
  const missing = input.missingFields.map((field) => PROFILE_FIELD_LABELS[field]).join(", ");
  const user = [
    "Based on the conversation so far, the candidate has provided:",
    JSON.stringify(toProfileJson(input.profile), null, 2),
    "",
    `Missing information: ${missing}`,
    "",
    translate(input.language, "next_question_instruction"),
  ].join("\n");

  return [
    { role: "system", content: translate(input.language, "system_prompt") },
    { role: "user", content: user },
  ];
}
