import express, { Express, Request, Response } from "express";
import { createLlmProvider, LlmProvider } from "./ai/llm.provider";
import { buildAutomationController } from "./automation/automation.controller";
import { CompressionService } from "./compression/compression.service";
import { DecompressionService } from "./compression/decompression.service";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { AirtableRestClient } from "./db/airtable.client";
import { RecordStore } from "./db/record-store";
import { ApplicantsRepository } from "./db/repositories/applicants.repo";
import { PersonalDetailsRepository } from "./db/repositories/personal-details.repo";
import { SalaryPreferencesRepository } from "./db/repositories/salary-preferences.repo";
import { ShortlistedLeadsRepository } from "./db/repositories/shortlisted-leads.repo";
import { WorkExperienceRepository } from "./db/repositories/work-experience.repo";
import { EnrichmentService } from "./enrichment/enrichment.service";
import { PipelineService } from "./pipeline/pipeline.service";
import { ShortlistService } from "./shortlist/shortlist.service";
import { SleepFn } from "./shared/utils/sleep";

export interface ApplicantServices {
  compression: CompressionService;
  decompression: DecompressionService;
  shortlist: ShortlistService;
  enrichment: EnrichmentService;
  pipeline: PipelineService;
}

export interface ServiceOverrides {
  logger?: Logger;
  store?: RecordStore;
  provider?: LlmProvider;
  sleep?: SleepFn;
  now?: () => Date;
}

export interface ServiceContext {
  services: ApplicantServices;
  logger: Logger;
  provider: LlmProvider;
}

export interface AppContext {
  app: Express;
  logger: Logger;
}

export function createServices(env: EnvConfig, overrides: ServiceOverrides = {}): ServiceContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const store =
    overrides.store ??
    new AirtableRestClient(
      {
        apiUrl: env.airtableApiUrl,
        baseId: env.airtableBaseId,
        apiKey: env.airtableApiKey,
      },
      logger,
    );
  const provider =
    overrides.provider ??
    createLlmProvider(
      {
        provider: env.llmProvider,
        apiKey: env.llmApiKey,
        model: env.llmModel,
        maxTokens: env.maxTokensPerCall,
      },
      logger,
    );
  const now = overrides.now ?? (() => new Date());

  const applicantsRepository = new ApplicantsRepository(logger, store);
  const personalDetailsRepository = new PersonalDetailsRepository(logger, store);
  const workExperienceRepository = new WorkExperienceRepository(logger, store);
  const salaryPreferencesRepository = new SalaryPreferencesRepository(logger, store);
  const shortlistedLeadsRepository = new ShortlistedLeadsRepository(logger, store);

  const compression = new CompressionService(
    applicantsRepository,
    personalDetailsRepository,
    workExperienceRepository,
    salaryPreferencesRepository,
    logger,
    now,
  );
  const decompression = new DecompressionService(
    applicantsRepository,
    personalDetailsRepository,
    workExperienceRepository,
    salaryPreferencesRepository,
    logger,
  );
  const shortlist = new ShortlistService(
    applicantsRepository,
    shortlistedLeadsRepository,
    env.shortlistCriteria,
    logger,
    env.duplicateLeadPolicy,
    now,
  );
  const enrichment = new EnrichmentService(applicantsRepository, provider, logger, {
    maxAttempts: env.maxRetries,
    retryBaseDelayMs: env.llmRetryBaseDelayMs,
    batchDelayMs: env.batchDelayMs,
    sleep: overrides.sleep,
  });
  const pipeline = new PipelineService(compression, shortlist, enrichment, logger);

  return {
    services: { compression, decompression, shortlist, enrichment, pipeline },
    logger,
    provider,
  };
}

export function createApp(env: EnvConfig, overrides: ServiceOverrides = {}): AppContext {
  const { services, logger } = createServices(env, overrides);
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use(
    "/automation",
    buildAutomationController({
      services,
      logger,
      secret: env.automationSecret,
    }),
  );

  return { app, logger };
}
