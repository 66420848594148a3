import assert from "node:assert/strict";
import { test } from "node:test";
import { buildExportFileName, renderCandidatesCsv, renderExportJson } from "../../storage/export.service";
import { StoredProfileSummary } from "../../storage/persistence.gateway";

const HEADER =
  "id,session_id,full_name,email,phone,years_experience,desired_positions,current_location,tech_stack,created_at,updated_at";

function summary(overrides: Partial<StoredProfileSummary> = {}): StoredProfileSummary {
  return {
    profileId: "1",
    sessionId: "s1",
    profile: {
      fullName: "Jane Doe",
      email: "jane@example.com",
      phone: "+1 555 123 4567",
      yearsExperience: 4,
      desiredPositions: ["Backend Developer", "Tech Lead"],
      currentLocation: "Berlin, Germany",
      techStack: ["Go"],
    },
    createdAt: "2026-03-01T10:00:00.000Z",
    updatedAt: "2026-03-01T10:30:00.000Z",
    ...overrides,
  };
}

test("csv has one row per candidate with quoted cells where needed", () => {
  const csv = renderCandidatesCsv([summary()]);
  assert.equal(
    csv,
    `${HEADER}\n` +
      "1,s1,Jane Doe,jane@example.com,+1 555 123 4567,4,Backend Developer; Tech Lead,\"Berlin, Germany\",Go," +
      "2026-03-01T10:00:00.000Z,2026-03-01T10:30:00.000Z\n",
  );
});

test("csv escapes embedded quotes and leaves missing values empty", () => {
  const csv = renderCandidatesCsv([
    summary({
      profileId: "2",
      sessionId: "s2",
      profile: { fullName: "Jane \"JD\" Doe", desiredPositions: [], techStack: [] },
    }),
  ]);
  assert.equal(
    csv.split("\n")[1],
    "2,s2,\"Jane \"\"JD\"\" Doe\",,,,,,,2026-03-01T10:00:00.000Z,2026-03-01T10:30:00.000Z",
  );
});

test("empty export is just the header", () => {
  assert.equal(renderCandidatesCsv([]), `${HEADER}\n`);
});

test("json export is indented", () => {
  assert.equal(
    renderExportJson({ exportedAt: "2026-03-01T10:00:00.000Z", candidates: [] }),
    "{\n  \"exportedAt\": \"2026-03-01T10:00:00.000Z\",\n  \"candidates\": []\n}",
  );
});

test("export file names carry a UTC timestamp", () => {
  const now = new Date("2026-03-01T10:05:09.000Z");
  assert.equal(buildExportFileName("candidates", "csv", now), "candidates_20260301_100509.csv");
  assert.equal(buildExportFileName("candidates", "json", now), "candidates_20260301_100509.json");
});
