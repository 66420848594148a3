import assert from "node:assert/strict";
import { test } from "node:test";
import {
  formatQuestionHeader,
  formatTechnicalIntro,
  getSupportedLanguages,
  isSupportedLanguage,
  translate,
} from "../../i18n/language.service";
import de from "../../i18n/locales/de.json";
import en from "../../i18n/locales/en.json";
import fr from "../../i18n/locales/fr.json";
import hi from "../../i18n/locales/hi.json";
import kn from "../../i18n/locales/kn.json";

test("supported languages are listed in a fixed order with names", () => {
  const languages = getSupportedLanguages();
  assert.deepEqual(
    languages.map((language) => language.code),
    ["en", "de", "hi", "kn", "fr"],
  );
  assert.deepEqual(languages[0], { code: "en", name: "English", flag: "🇬🇧" });
  assert.equal(languages[1].name, "Deutsch");
});

test("language codes are validated", () => {
  assert.equal(isSupportedLanguage("fr"), true);
  assert.equal(isSupportedLanguage("es"), false);
  assert.equal(isSupportedLanguage("EN"), false);
});

test("question header is localized", () => {
  assert.equal(formatQuestionHeader("en", 1, 3), "Question 1 of 3:");
  assert.equal(formatQuestionHeader("de", 2, 5), "Frage 2 von 5:");
  assert.equal(formatQuestionHeader("fr", 3, 4), "Question 3 sur 4 :");
});

test("every locale carries every English message key", () => {
  const englishKeys = Object.keys(en).sort();
  for (const [code, messages] of Object.entries({ de, hi, kn, fr })) {
    assert.deepEqual(Object.keys(messages).sort(), englishKeys, `locale ${code}`);
  }
});

test("fallback questions and intro filler are localized for hi and kn", () => {
  assert.equal(translate("hi", "primary_technology"), "आपकी मुख्य तकनीक");
  assert.equal(
    translate("kn", "fallback_question_experience", { technology: "Rust" }),
    "Rust ಜೊತೆಗಿನ ನಿಮ್ಮ ಅನುಭವವನ್ನು ವಿವರಿಸಬಹುದೇ?",
  );
});

test("unknown placeholders are left untouched", () => {
  assert.equal(translate("en", "question_format", { current: 1 }), "Question 1 of {total}:");
});

test("technical intro names the candidate and their stack", () => {
  const intro = formatTechnicalIntro("en", "Jane", ["TypeScript", "Go"]);
  assert.equal(intro.split("\n")[0], "Hello Jane,");
  assert.ok(intro.includes("a strong foundation in TypeScript, Go."));
  assert.ok(formatTechnicalIntro("en", "Jane", []).includes("a strong foundation in your technologies."));
});
