import assert from "node:assert/strict";
import { test } from "node:test";
import {
  appendUnique,
  calculateProfileProgress,
  createEmptyProfile,
  getMissingFields,
  isProfileComplete,
  mergeExtractedFields,
  overwriteExtractedFields,
} from "../../profiles/candidate-profile";
import { CandidateProfile } from "../../shared/types/profile.types";

function completeProfile(): CandidateProfile {
  return {
    fullName: "Jane Doe",
    email: "jane@example.com",
    phone: "+1 555 123 4567",
    yearsExperience: 4,
    desiredPositions: ["Backend Developer"],
    currentLocation: "Berlin",
    techStack: ["TypeScript", "PostgreSQL"],
  };
}

function testEmptyProfileIsMissingEverything(): void {
  const profile = createEmptyProfile();
  assert.deepEqual(getMissingFields(profile), [
    "fullName",
    "email",
    "phone",
    "yearsExperience",
    "desiredPositions",
    "currentLocation",
    "techStack",
  ]);
  assert.equal(calculateProfileProgress(profile), 0);
  assert.equal(isProfileComplete(profile), false);
}

function testProgressRoundsToWholePercent(): void {
  const profile = createEmptyProfile();
  profile.fullName = "Jane Doe";
  assert.equal(calculateProfileProgress(profile), 14);
  profile.email = "jane@example.com";
  assert.equal(calculateProfileProgress(profile), 29);
  assert.equal(calculateProfileProgress(completeProfile()), 100);
}

function testZeroYearsCountsAsPopulated(): void {
  const profile = completeProfile();
  profile.yearsExperience = 0;
  assert.equal(isProfileComplete(profile), true);
}

function testBlankTextDoesNotCount(): void {
  const profile = completeProfile();
  profile.currentLocation = "   ";
  assert.deepEqual(getMissingFields(profile), ["currentLocation"]);
}

function testMergeKeepsFirstScalarAndAppendsLists(): void {
  const profile = createEmptyProfile();
  profile.fullName = "Jane Doe";
  profile.techStack.push("Python");
  const changed = mergeExtractedFields(profile, {
    fullName: "Someone Else",
    email: "jane@example.com",
    yearsExperience: 3,
    techStack: ["python", "Django", " Django "],
  });
  assert.equal(profile.fullName, "Jane Doe");
  assert.equal(profile.email, "jane@example.com");
  assert.equal(profile.yearsExperience, 3);
  assert.deepEqual(profile.techStack, ["Python", "Django"]);
  assert.deepEqual(changed, ["email", "yearsExperience", "techStack"]);
}

function testOverwriteReplacesScalars(): void {
  const profile = completeProfile();
  const changed = overwriteExtractedFields(profile, {
    currentLocation: "Munich",
    yearsExperience: 4,
    desiredPositions: ["Tech Lead"],
  });
  assert.equal(profile.currentLocation, "Munich");
  assert.deepEqual(profile.desiredPositions, ["Backend Developer", "Tech Lead"]);
  assert.deepEqual(changed, ["currentLocation", "desiredPositions"]);
}

function testAppendUniqueIgnoresCaseAndBlanks(): void {
  const target = ["React"];
  assert.equal(appendUnique(target, ["react", "", "Vue", "VUE"]), 1);
  assert.deepEqual(target, ["React", "Vue"]);
}

test("empty profile reports every field missing", testEmptyProfileIsMissingEverything);
test("progress is a rounded share of populated fields", testProgressRoundsToWholePercent);
test("zero years of experience counts as populated", testZeroYearsCountsAsPopulated);
test("whitespace-only text is treated as missing", testBlankTextDoesNotCount);
test("merge keeps existing scalars and appends unique list values", testMergeKeepsFirstScalarAndAppendsLists);
test("overwrite replaces scalars during corrections", testOverwriteReplacesScalars);
test("appendUnique skips duplicates regardless of case", testAppendUniqueIgnoresCaseAndBlanks);
