import {
  END_CONVERSATION_KEYWORDS,
  PROFILE_INFO_KEYWORDS,
  UPDATE_INTENT_KEYWORDS,
} from "../shared/constants";
import { UpdatableField } from "../shared/types/intake.types";

export function isEndOfConversation(message: string): boolean {
  return message
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .some((word) => END_CONVERSATION_KEYWORDS.has(word));
}

// Both an update verb and a profile noun must appear; "change" alone is an answer.
export function isUpdateIntent(message: string): boolean {
  const lower = message.toLowerCase();
  const hasUpdateVerb = UPDATE_INTENT_KEYWORDS.some((keyword) => lower.includes(keyword));
  const mentionsProfileInfo = PROFILE_INFO_KEYWORDS.some((keyword) => lower.includes(keyword));
  return hasUpdateVerb && mentionsProfileInfo;
}

export function detectUpdateField(message: string): UpdatableField | null {
  const lower = message.toLowerCase();
  if (lower.includes("location")) {
    return "location";
  }
  if (lower.includes("email")) {
    return "email";
  }
  if (lower.includes("phone")) {
    return "phone";
  }
  return null;
}
