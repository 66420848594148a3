import { ConversationPhase } from "../shared/types/intake.types";

const transitionRules: Record<ConversationPhase, ConversationPhase[]> = {
  greeting: ["info_gathering", "technical_questions", "completed"],
  info_gathering: ["technical_questions", "completed"],
  technical_questions: ["completed"],
  completed: [],
};

export function isAllowedTransition(from: ConversationPhase, to: ConversationPhase): boolean {
  return from === to || transitionRules[from].includes(to);
}
