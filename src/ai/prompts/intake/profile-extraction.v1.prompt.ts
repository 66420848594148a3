import { LanguageCode, translate } from "../../../i18n/language.service";
import { CandidateProfile } from "../../../shared/types/profile.types";
import { ChatMessage } from "../../llm.client";
import { toProfileJson } from "./profile-json";

export const PROFILE_EXTRACTION_V1_FIELD_NOTES = `- Full name (can be a single name like "Helen", "John", or a full name like "John Doe")
- Email address
- Phone number
- Years of experience
- Desired positions (including job titles like developer, tester, engineer, analyst, manager)
- Current location (city, state, or country names)
- Tech stack

Important notes:
- If the message is a simple name (1-3 words with only letters), extract it as full_name
- Single names like "Helen", "Sarah", "John" are full_name
- Any job role or position mentioned (e.g. "software tester", "tester", "QA engineer", "developer") is desired_positions
- A single word or simple place name (e.g. "Goa", "Mumbai", "Bangalore", "USA") is current_location
- Do NOT extract names as positions`;

export const PROFILE_EXTRACTION_V1_OUTPUT = `Return STRICT JSON only. No markdown.
Keys: full_name, email, phone, years_experience, desired_positions, current_location, tech_stack.
Use null for anything not present in the message. desired_positions and tech_stack may be a string or an array of strings.

Examples:
User message: "helen"
Expected output: {"full_name": "helen"}

User message: "software tester"
Expected output: {"desired_positions": "software tester"}

User message: "I'm Sarah and I want to be a tester"
Expected output: {"full_name": "Sarah", "desired_positions": "tester"}

User message: "goa"
Expected output: {"current_location": "goa"}

User message: "I live in Bangalore and work with Python and Django"
Expected output: {"current_location": "Bangalore", "tech_stack": ["Python", "Django"]}`;

export function buildProfileExtractionV1Messages(input: {
  language: LanguageCode;
  message: string;
  profile: CandidateProfile;
}): ChatMessage[] {
  const user = [
    `${translate(input.language, "extraction_instruction")}:`,
    PROFILE_EXTRACTION_V1_FIELD_NOTES,
    "",
    "Already collected:",
    JSON.stringify(toProfileJson(input.profile), null, 2),
    "",
    `User message: ${JSON.stringify(input.message)}`,
    "",
    PROFILE_EXTRACTION_V1_OUTPUT,
  ].join("\n");

  return [
    { role: "system", content: translate(input.language, "system_prompt") },
    { role: "user", content: user },
  ];
}
