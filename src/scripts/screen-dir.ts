// Usage: npm run screen -- <job-description.pdf|txt> <resume-dir>
import 'dotenv/config';
import { readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { loadConfig } from '../config';
import { createLogger } from '../logger';
import { SUPPORTED_EXTENSIONS } from '../parsing/parser';
import { CSV_FILE_NAME, resultsToCsv, toPercent } from '../screening/csv';
import { createServices } from '../services';
import type { UploadedFile } from '../types';

const RESUME_EXTENSIONS = new Set<string>(SUPPORTED_EXTENSIONS);

export async function listResumeFiles(resumeDir: string): Promise<string[]> {
  const entries = await readdir(resumeDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .filter((name) => RESUME_EXTENSIONS.has(path.extname(name).toLowerCase()))
    .sort((a, b) => a.localeCompare(b));
}

async function loadUpload(filePath: string): Promise<UploadedFile> {
  return { name: path.basename(filePath), bytes: await readFile(filePath) };
}

async function main(args: string[]) {
  const [jdPath, resumeDir] = args;
  if (!jdPath || !resumeDir) {
    console.error('Usage: npm run screen -- <job-description.pdf|txt> <resume-dir>');
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const logger = createLogger(config.log);
  const { pipeline } = await createServices(config, logger);

  const resumeFiles = await listResumeFiles(resumeDir);
  if (resumeFiles.length === 0) {
    logger.warn(`No .pdf or .txt resumes found in ${resumeDir}`);
    return;
  }

  const run = await pipeline.run({
    jobDescription: await loadUpload(jdPath),
    resumes: await Promise.all(resumeFiles.map((f) => loadUpload(path.join(resumeDir, f)))),
  });

  for (const [i, r] of run.results.entries()) {
    logger.info(`${i + 1}. ${r.resumeName}: ${toPercent(r.compositeScore)}%`);
  }
  for (const f of run.failures) {
    logger.warn(`✗ ${f.name} (${f.kind}): ${f.message}`);
  }

  const csvPath = path.join(resumeDir, CSV_FILE_NAME);
  await writeFile(csvPath, resultsToCsv(run.results), 'utf-8');
  logger.info(`📄 Results written to ${csvPath}`);
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error) => {
    console.error('❌ Screening failed:', error);
    process.exit(1);
  });
}
