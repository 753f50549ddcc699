#!/usr/bin/env node
import { parseArgs } from "node:util";
import { createServices } from "./app";
import { loadEnv } from "./config/env";
import { BatchSummary, OperationResult } from "./shared/types/result.types";

const COMMANDS = ["compress", "decompress", "shortlist", "enrich", "pipeline"] as const;
type Command = (typeof COMMANDS)[number];

const USAGE = `Usage: applicant-intake <command> (--applicant-id <id> | --all) [--force] [--delay-ms <ms>]

Commands:
  compress     Build the compressed JSON from the child tables
  decompress   Write the compressed JSON back to the child tables
  shortlist    Evaluate shortlist criteria and record a lead on pass
  enrich       Request the LLM evaluation and store it on the applicant
  pipeline     compress, shortlist, then enrich`;

export interface CliArgs {
  command: Command;
  applicantId?: string;
  all: boolean;
  force: boolean;
  delayMs?: number;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "applicant-id": { type: "string" },
      all: { type: "boolean", default: false },
      force: { type: "boolean", default: false },
      "delay-ms": { type: "string" },
    },
  });

  const command = COMMANDS.find((candidate) => candidate === positionals[0]);
  if (!command) {
    throw new Error(`Unknown command: ${positionals[0] ?? "(none)"}`);
  }

  const applicantId = values["applicant-id"]?.trim();
  const all = values.all ?? false;
  if (Boolean(applicantId) === all) {
    throw new Error("Pass exactly one of --applicant-id or --all");
  }

  let delayMs: number | undefined;
  const delayRaw = values["delay-ms"];
  if (delayRaw !== undefined) {
    delayMs = Number(delayRaw);
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new Error(`Invalid --delay-ms value: ${delayRaw}`);
    }
  }

  return {
    command,
    applicantId: applicantId || undefined,
    all,
    force: values.force ?? false,
    delayMs,
  };
}

async function runSingle(args: CliArgs, applicantId: string): Promise<boolean> {
  const env = loadEnv();
  const { services } = createServices(env);

  if (args.command === "pipeline") {
    const report = await services.pipeline.runForApplicant(applicantId, { forceLlm: args.force });
    console.log(JSON.stringify(report, null, 2));
    return report.ok;
  }

  let result: OperationResult<unknown>;
  if (args.command === "compress") {
    result = await services.compression.compress(applicantId);
  } else if (args.command === "decompress") {
    result = await services.decompression.decompress(applicantId);
  } else if (args.command === "shortlist") {
    result = await services.shortlist.evaluate(applicantId);
  } else {
    result = await services.enrichment.enrich(applicantId, args.force);
  }
  console.log(JSON.stringify(result, null, 2));
  return result.ok;
}

async function runAll(args: CliArgs): Promise<boolean> {
  const loaded = loadEnv();
  const env = args.delayMs === undefined ? loaded : { ...loaded, batchDelayMs: args.delayMs };
  const { services } = createServices(env);

  if (args.command === "pipeline") {
    const report = await services.pipeline.runForAll({ forceLlm: args.force });
    console.log(JSON.stringify(report, null, 2));
    return report.ok;
  }

  let result: OperationResult<BatchSummary>;
  if (args.command === "compress") {
    result = await services.compression.compressAll();
  } else if (args.command === "decompress") {
    result = await services.decompression.decompressAll();
  } else if (args.command === "shortlist") {
    result = await services.shortlist.shortlistAll();
  } else {
    result = await services.enrichment.enrichAll(args.force);
  }
  console.log(JSON.stringify(result, null, 2));
  return result.ok && result.data.failed === 0;
}

async function run(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const ok = args.applicantId ? await runSingle(args, args.applicantId) : await runAll(args);
  if (!ok) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  run().catch((error) => {
    console.error("applicant-intake failed:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
