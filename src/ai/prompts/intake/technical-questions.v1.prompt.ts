import { LanguageCode, translate } from "../../../i18n/language.service";
import { ChatMessage } from "../../llm.client";

export function buildTechnicalQuestionsV1Messages(input: {
  language: LanguageCode;
  techStack: ReadonlyArray<string>;
  yearsExperience: number;
}): ChatMessage[] {
  const user = translate(input.language, "technical_questions_instruction", {
    tech_stack: input.techStack.join(", "),
    years: input.yearsExperience,
  });

  return [
    { role: "system", content: translate(input.language, "system_prompt") },
    { role: "user", content: `${user}\nReturn only the JSON array of question strings.` },
  ];
}
