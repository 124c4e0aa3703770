import "dotenv/config";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { createScreeningContainer } from "../src/app";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { DocumentService } from "../src/documents/document.service";
import { buildReportRows } from "../src/matching/ranking-report";
import { ResumeDocument } from "../src/screening/screening.service";
import { errorMessage } from "../src/shared/errors";

interface CliArgs {
  jobFile: string;
  resumesDir: string;
  preferencesFile?: string;
  killerSkillsFile?: string;
  killerExperienceFile?: string;
}

const USAGE =
  "Usage: npm run rank -- <job-file> <resumes-dir> [--preferences file] [--killer-skills file] [--killer-experience file]";

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${arg}. ${USAGE}`);
    }
    flags.set(arg.slice(2), value);
    index += 1;
  }

  const [jobFile, resumesDir] = positional;
  if (!jobFile || !resumesDir) {
    throw new Error(USAGE);
  }
  for (const flag of flags.keys()) {
    if (flag !== "preferences" && flag !== "killer-skills" && flag !== "killer-experience") {
      throw new Error(`Unknown option --${flag}. ${USAGE}`);
    }
  }

  return {
    jobFile,
    resumesDir,
    preferencesFile: flags.get("preferences"),
    killerSkillsFile: flags.get("killer-skills"),
    killerExperienceFile: flags.get("killer-experience"),
  };
}

async function readDocument(documentService: DocumentService, filePath: string): Promise<string> {
  const buffer = await readFile(filePath);
  return documentService.extractText(buffer, path.basename(filePath));
}

async function readOptionalText(filePath: string | undefined): Promise<string | undefined> {
  return filePath ? readFile(filePath, "utf8") : undefined;
}

async function readResumes(documentService: DocumentService, resumesDir: string): Promise<ResumeDocument[]> {
  const entries = await readdir(resumesDir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && documentService.isSupported(entry.name))
    .map((entry) => entry.name)
    .sort((left, right) => left.localeCompare(right));

  const resumes: ResumeDocument[] = [];
  for (const fileName of files) {
    try {
      resumes.push({ id: fileName, text: await readDocument(documentService, path.join(resumesDir, fileName)) });
    } catch (error) {
      process.stderr.write(`Skipping ${fileName}: ${errorMessage(error)}\n`);
    }
  }
  return resumes;
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const env = loadEnv();
  // Logs go to stderr so stdout carries only report rows.
  const logger = createLogger({
    minLevel: env.logLevel,
    write: (line) => process.stderr.write(line),
  });
  const { documentService, screeningService } = createScreeningContainer(env, logger);

  const jobDescription = await readDocument(documentService, args.jobFile);
  const resumes = await readResumes(documentService, args.resumesDir);
  if (resumes.length === 0) {
    throw new Error(`No readable PDF, DOCX or TXT résumés found in ${args.resumesDir}`);
  }

  const result = await screeningService.rankDocuments(
    {
      jobDescription,
      resumes,
      preferencesText: await readOptionalText(args.preferencesFile),
      killerSkillsText: await readOptionalText(args.killerSkillsFile),
      killerExperienceText: await readOptionalText(args.killerExperienceFile),
    },
    { timeoutMs: env.rankingTimeoutMs },
  );

  const rows = buildReportRows(result.ranking);
  rows.forEach((row, position) => {
    process.stdout.write(`${JSON.stringify({ resumeId: result.ranking[position].resumeId, ...row })}\n`);
  });
  for (const failure of result.failures) {
    process.stderr.write(`Not ranked ${failure.resumeId}: ${failure.kind} ${failure.message}\n`);
  }
  if (!result.complete) {
    process.stderr.write(`Ranking incomplete, cancelled: ${result.cancelled.join(", ")}\n`);
  }
}

run().catch((error) => {
  console.error("rank-resumes failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
