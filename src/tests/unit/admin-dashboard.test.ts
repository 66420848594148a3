import assert from "node:assert/strict";
import { test } from "node:test";
import { AdminDashboardService } from "../../admin/admin-dashboard.service";
import { createEmptyProfile } from "../../profiles/candidate-profile";
import { CandidateProfile } from "../../shared/types/profile.types";
import { InMemoryPersistenceGateway } from "../../storage/in-memory.gateway";
import { noopLogger } from "../support/fakes";

const NOW = new Date("2026-03-01T10:00:00.000Z");

function fullProfile(years: number): CandidateProfile {
  return {
    fullName: "Jane Doe",
    email: "jane@example.com",
    phone: "+1 555 123 4567",
    yearsExperience: years,
    desiredPositions: ["Backend Developer"],
    currentLocation: "Berlin",
    techStack: ["Go"],
  };
}

async function seed(): Promise<AdminDashboardService> {
  const gateway = new InMemoryPersistenceGateway(noopLogger, () => NOW);
  await gateway.createOrUpdateProfile("s1", fullProfile(3));
  await gateway.createOrUpdateProfile("s2", fullProfile(4));
  await gateway.createOrUpdateProfile("s3", { ...createEmptyProfile(), email: "only@example.com" });
  return new AdminDashboardService(gateway, noopLogger, () => NOW);
}

test("overview averages only reported experience", async () => {
  const service = await seed();
  assert.deepEqual(await service.getOverview(), {
    store: "memory",
    totalCandidates: 3,
    averageExperience: 3.5,
    completedProfiles: 2,
    createdToday: 3,
  });
});

test("overview of an empty store has no average", async () => {
  const service = new AdminDashboardService(new InMemoryPersistenceGateway(noopLogger, () => NOW), noopLogger);
  const overview = await service.getOverview();
  assert.equal(overview.totalCandidates, 0);
  assert.equal(overview.averageExperience, null);
});

test("profile list filters on completeness", async () => {
  const service = await seed();
  const complete = await service.listProfiles({ complete: true });
  const incomplete = await service.listProfiles({ complete: false });
  assert.deepEqual(
    complete.map((item) => item.sessionId),
    ["s2", "s1"],
  );
  assert.deepEqual(
    incomplete.map((item) => item.sessionId),
    ["s3"],
  );
  assert.equal((await service.listProfiles({ limit: 1 })).length, 1);
});

test("exports are named by timestamp", async () => {
  const service = await seed();
  const csv = await service.exportCsv();
  assert.equal(csv.fileName, "candidates_20260301_100000.csv");
  assert.equal(csv.body.split("\n").length, 5);
  const json = await service.exportJson();
  assert.equal(json.fileName, "candidates_20260301_100000.json");
  assert.equal(json.contentType, "application/json; charset=utf-8");
});
