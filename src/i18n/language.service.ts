import de from "./locales/de.json";
import en from "./locales/en.json";
import fr from "./locales/fr.json";
import hi from "./locales/hi.json";
import kn from "./locales/kn.json";

export const SUPPORTED_LANGUAGES = ["en", "de", "hi", "kn", "fr"] as const;

export type LanguageCode = (typeof SUPPORTED_LANGUAGES)[number];
export type MessageKey = keyof typeof en;
export type MessageParams = Record<string, string | number>;

const LOCALES: Record<LanguageCode, Partial<Record<MessageKey, string>>> = {
  en,
  de,
  hi,
  kn,
  fr,
};

export interface LanguageDescriptor {
  code: LanguageCode;
  name: string;
  flag: string;
}

export function isSupportedLanguage(value: string): value is LanguageCode {
  return SUPPORTED_LANGUAGES.some((code) => code === value);
}

export function getSupportedLanguages(): LanguageDescriptor[] {
  return SUPPORTED_LANGUAGES.map((code) => ({
    code,
    name: translate(code, "language_name"),
    flag: translate(code, "language_flag"),
  }));
}

/**
 * Looks up a message in the requested locale and falls back to English
 * when the locale does not carry the key.
 */
export function translate(language: LanguageCode, key: MessageKey, params?: MessageParams): string {
  const template = LOCALES[language][key] ?? en[key];
  return params ? interpolate(template, params) : template;
}

export function formatQuestionHeader(language: LanguageCode, current: number, total: number): string {
  return translate(language, "question_format", { current, total });
}

export function formatTechnicalIntro(
  language: LanguageCode,
  name: string,
  techStack: ReadonlyArray<string>,
): string {
  const stack = techStack.length > 0 ? techStack.join(", ") : translate(language, "your_technologies");
  return translate(language, "tech_questions_intro", { name, tech_stack: stack });
}

function interpolate(template: string, params: MessageParams): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}
