export const JOB_ROLE_KEYWORDS: ReadonlySet<string> = new Set([
  "tester",
  "developer",
  "engineer",
  "analyst",
  "manager",
  "designer",
  "architect",
  "consultant",
  "specialist",
  "lead",
  "programmer",
  "administrator",
  "devops",
  "qa",
  "scientist",
  "intern",
  "associate",
]);

export const END_CONVERSATION_KEYWORDS: ReadonlySet<string> = new Set([
  "exit",
  "quit",
  "stop",
  "bye",
  "goodbye",
  "cancel",
]);

export const UPDATE_INTENT_KEYWORDS: ReadonlyArray<string> = ["update", "change", "modify", "correct", "edit"];

export const PROFILE_INFO_KEYWORDS: ReadonlyArray<string> = [
  "location",
  "email",
  "phone",
  "name",
  "position",
  "tech stack",
];

export const MAX_TECHNICAL_QUESTIONS = 5;
export const POSITION_FALLBACK_MAX_LENGTH = 50;
export const MIN_PHONE_MATCH_LENGTH = 10;
export const SHORT_ANSWER_MAX_TOKENS = 3;

export const EXTRACTION_TEMPERATURE = 0.3;
export const QUESTION_GENERATION_TEMPERATURE = 0.5;

export const ADMIN_SESSION_COOKIE_NAME = "intake_admin_session";
