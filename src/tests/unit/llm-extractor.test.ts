import assert from "node:assert/strict";
import { test } from "node:test";
import { LlmExtractorService, parseExtractedFields } from "../../intake/llm-extractor.service";
import { createEmptyProfile } from "../../profiles/candidate-profile";
import { noopLogger, ScriptedLlmClient } from "../support/fakes";

function testSnakeCaseFieldsAreRead(): void {
  assert.deepEqual(
    parseExtractedFields({
      full_name: " Jane Doe ",
      email: "null",
      phone: 5551234567,
      years_experience: "7",
      desired_positions: "Data Engineer",
      tech_stack: ["Python", null, "Spark"],
      current_location: null,
    }),
    {
      fullName: "Jane Doe",
      phone: "5551234567",
      yearsExperience: 7,
      desiredPositions: ["Data Engineer"],
      techStack: ["Python", "Spark"],
    },
  );
}

function testImplausibleYearsAreDropped(): void {
  assert.deepEqual(parseExtractedFields({ years_experience: -2 }), {});
  assert.deepEqual(parseExtractedFields({ years_experience: "five" }), {});
  assert.deepEqual(parseExtractedFields({ years_experience: 3.8 }), { yearsExperience: 3 });
}

async function testExtractIntoMergesWithoutOverwriting(): Promise<void> {
  const llmClient = new ScriptedLlmClient().reply(
    "profile_extraction_v1",
    "```json\n{\"full_name\": \"Other Name\", \"tech_stack\": [\"Go\", \"gRPC\"]}\n```",
  );
  const service = new LlmExtractorService(llmClient, noopLogger);
  const profile = createEmptyProfile();
  profile.fullName = "Jane Doe";

  const changed = await service.extractInto("I work with Go and gRPC", profile, "en");

  assert.deepEqual(changed, ["techStack"]);
  assert.equal(profile.fullName, "Jane Doe");
  assert.deepEqual(profile.techStack, ["Go", "gRPC"]);
  assert.equal(llmClient.calls[0].options?.temperature, 0.3);
  const userMessage = llmClient.calls[0].messages[1].content;
  assert.ok(userMessage.includes("I work with Go and gRPC"));
}

async function testModelFailureLeavesProfileUntouched(): Promise<void> {
  const llmClient = new ScriptedLlmClient().reply("profile_extraction_v1", "I could not find anything.");
  const service = new LlmExtractorService(llmClient, noopLogger);
  const profile = createEmptyProfile();
  assert.equal(await service.extract("hello", profile, "en"), null);
  assert.deepEqual(await service.extractInto("hello", profile, "en"), []);
  assert.deepEqual(profile, createEmptyProfile());
}

test("snake_case model output is mapped onto profile fields", testSnakeCaseFieldsAreRead);
test("implausible years values are dropped", testImplausibleYearsAreDropped);
test("extracted values merge without overwriting known fields", testExtractIntoMergesWithoutOverwriting);
test("unusable model output changes nothing", testModelFailureLeavesProfileUntouched);
