import "dotenv/config";
import { readFileSync } from "node:fs";
import path from "node:path";
import { coerceNumber, coerceString, isPlainObject } from "../src/compression/compressed-document";
import { createLogger } from "../src/config/logger";
import { AirtableRestClient } from "../src/db/airtable.client";
import { ApplicantsRepository } from "../src/db/repositories/applicants.repo";
import { PersonalDetailsRepository } from "../src/db/repositories/personal-details.repo";
import { SalaryPreferencesRepository } from "../src/db/repositories/salary-preferences.repo";
import { WorkExperienceRepository } from "../src/db/repositories/work-experience.repo";
import {
  PersonalDetailsInput,
  SalaryPreferenceInput,
  WorkExperienceInput,
} from "../src/shared/types/applicant.types";

interface SampleApplicant {
  personal: PersonalDetailsInput;
  experience: WorkExperienceInput[];
  salary: SalaryPreferenceInput;
}

const SAMPLE_PATH = path.join(__dirname, "data", "sample-applicant.json");

function readSample(filePath: string): SampleApplicant {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  if (!isPlainObject(raw)) {
    throw new Error(`Sample applicant at ${filePath} must be a JSON object`);
  }
  const personal = raw.personal;
  const salary = raw.salary;
  if (!isPlainObject(personal) || !isPlainObject(salary)) {
    throw new Error(`Sample applicant at ${filePath} must have personal and salary objects`);
  }
  const experience = Array.isArray(raw.experience) ? raw.experience.filter(isPlainObject) : [];

  return {
    personal: {
      fullName: coerceString(personal.fullName),
      email: coerceString(personal.email),
      location: coerceString(personal.location),
      linkedin: coerceString(personal.linkedin),
    },
    experience: experience.map((entry) => ({
      company: coerceString(entry.company),
      title: coerceString(entry.title),
      startDate: coerceString(entry.startDate),
      endDate: coerceString(entry.endDate),
      technologies: coerceString(entry.technologies),
      description: coerceString(entry.description),
    })),
    salary: {
      preferredRate: coerceNumber(salary.preferredRate) ?? 0,
      minimumRate: coerceNumber(salary.minimumRate) ?? 0,
      currency: coerceString(salary.currency) || "USD",
      availability: coerceNumber(salary.availability) ?? 0,
    },
  };
}

async function run(): Promise<void> {
  const apiKey = process.env.AIRTABLE_API_KEY?.trim();
  const baseId = process.env.AIRTABLE_BASE_ID?.trim();
  if (!apiKey || !baseId) {
    throw new Error("AIRTABLE_API_KEY and AIRTABLE_BASE_ID are required for seed:sample");
  }

  const logger = createLogger();
  const store = new AirtableRestClient(
    {
      apiUrl: process.env.AIRTABLE_API_URL?.trim() || "https://api.airtable.com/v0",
      baseId,
      apiKey,
    },
    logger,
  );
  const sample = readSample(process.argv[2] ?? SAMPLE_PATH);

  const applicantId = await new ApplicantsRepository(logger, store).create();
  await new PersonalDetailsRepository(logger, store).create(applicantId, sample.personal);
  const workExperienceRepository = new WorkExperienceRepository(logger, store);
  for (const entry of sample.experience) {
    await workExperienceRepository.create(applicantId, entry);
  }
  await new SalaryPreferencesRepository(logger, store).create(applicantId, sample.salary);

  console.log("Sample applicant seeded:", applicantId);
  console.log(`Next: npm run cli -- pipeline --applicant-id ${applicantId}`);
}

run().catch((error) => {
  console.error("seed:sample failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
