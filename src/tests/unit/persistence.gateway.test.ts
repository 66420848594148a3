import assert from "node:assert/strict";
import { test } from "node:test";
import { createEmptyProfile } from "../../profiles/candidate-profile";
import { CandidateProfile } from "../../shared/types/profile.types";
import { decodeCandidateRow, decodeList, encodeCandidateRow } from "../../storage/candidate-row.codec";
import { InMemoryPersistenceGateway } from "../../storage/in-memory.gateway";
import { noopLogger } from "../support/fakes";

const FIXED_NOW = "2026-03-01T10:00:00.000Z";

function createGateway(): InMemoryPersistenceGateway {
  return new InMemoryPersistenceGateway(noopLogger, () => new Date(FIXED_NOW));
}

function janeProfile(): CandidateProfile {
  return {
    fullName: "Jane Doe",
    email: "jane@example.com",
    yearsExperience: 0,
    desiredPositions: ["Backend Developer"],
    techStack: ["Go", "PostgreSQL"],
  };
}

function testListFieldsAreStoredAsJsonText(): void {
  const values = encodeCandidateRow("s1", janeProfile());
  assert.equal(values.desired_positions, "[\"Backend Developer\"]");
  assert.equal(values.tech_stack, "[\"Go\",\"PostgreSQL\"]");
  assert.equal(values.phone, null);
  assert.equal(values.years_experience, 0);

  const summary = decodeCandidateRow({ id: 7, ...values, created_at: FIXED_NOW, updated_at: FIXED_NOW });
  assert.equal(summary.profileId, "7");
  assert.deepEqual(summary.profile, janeProfile());
}

function testMalformedListsDecodeToEmpty(): void {
  assert.deepEqual(decodeList("not json"), []);
  assert.deepEqual(decodeList("{\"a\": 1}"), []);
  assert.deepEqual(decodeList("[\"a\", 1]"), ["a"]);
  assert.deepEqual(decodeList(null), []);
}

async function testProfilesUpsertBySession(): Promise<void> {
  const gateway = createGateway();
  const first = await gateway.createOrUpdateProfile("s1", createEmptyProfile());
  const again = await gateway.createOrUpdateProfile("s1", janeProfile());
  const second = await gateway.createOrUpdateProfile("s2", createEmptyProfile());

  assert.equal(first, "1");
  assert.equal(again, "1");
  assert.equal(second, "2");

  const listed = await gateway.listProfiles(10);
  assert.deepEqual(
    listed.map((item) => [item.profileId, item.sessionId]),
    [
      ["2", "s2"],
      ["1", "s1"],
    ],
  );
  assert.equal(listed[1].profile.fullName, "Jane Doe");
  assert.equal((await gateway.listProfiles(1)).length, 1);
}

async function testQuestionsAnswersAndTranscript(): Promise<void> {
  const gateway = createGateway();
  const profileId = await gateway.createOrUpdateProfile("s1", janeProfile());
  assert.deepEqual(await gateway.saveQuestionSet(profileId, ["Q1", "Q2"]), ["2", "3"]);
  assert.equal(await gateway.saveAnswer(profileId, 0, "first"), "4");
  assert.equal(await gateway.saveAnswer(profileId, 0, "second"), "5");
  assert.equal(await gateway.saveAnswer(profileId, 4, "nowhere"), null);
  await gateway.appendTranscript(profileId, "assistant", "Hello");
  await gateway.appendTranscript(profileId, "user", "Hi");

  const detail = await gateway.fetchProfileSummary(profileId);
  assert.ok(detail);
  assert.deepEqual(detail.questions, [
    { questionId: "2", questionIndex: 0, question: "Q1", answer: "second", answeredAt: FIXED_NOW },
    { questionId: "3", questionIndex: 1, question: "Q2", answer: null, answeredAt: null },
  ]);
  assert.deepEqual(detail.transcript, [
    { role: "assistant", content: "Hello", timestamp: FIXED_NOW },
    { role: "user", content: "Hi", timestamp: FIXED_NOW },
  ]);
  assert.equal(await gateway.fetchProfileSummary("99"), null);
}

async function testExportIncludesEveryCandidate(): Promise<void> {
  const gateway = createGateway();
  await gateway.createOrUpdateProfile("s1", janeProfile());
  await gateway.createOrUpdateProfile("s2", createEmptyProfile());

  const exported = await gateway.exportAll();
  assert.equal(exported.exportedAt, FIXED_NOW);
  assert.deepEqual(
    exported.candidates.map((item) => item.summary.sessionId),
    ["s2", "s1"],
  );
}

test("list fields are stored as JSON text and decoded back", testListFieldsAreStoredAsJsonText);
test("malformed list columns decode to empty lists", testMalformedListsDecodeToEmpty);
test("profiles are upserted by session and listed newest first", testProfilesUpsertBySession);
test("questions keep the latest answer and transcripts keep order", testQuestionsAnswersAndTranscript);
test("export contains every stored candidate", testExportIncludesEveryCandidate);
