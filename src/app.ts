import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import type { FileVectorStore } from './db/vectorStore';
import {
  EmbeddingError,
  errorMessage,
  InvalidRequestError,
  UnparseableDocumentError,
  UnsupportedDocumentError,
  VectorDimensionError,
} from './errors';
import type { OllamaClient } from './llm/ollama';
import type { Logger } from './logger';
import { CSV_FILE_NAME, resultsToCsv } from './screening/csv';
import type { JobDescriptionInput, ScreeningPipeline } from './screening/pipeline';
import type { RunStore } from './screening/runs';
import type { UploadedFile } from './types';

export interface AppDeps {
  pipeline: Pick<ScreeningPipeline, 'run'>;
  runs: RunStore;
  store: Pick<FileVectorStore, 'getAllEntries'>;
  llm: Pick<OllamaClient, 'healthCheck' | 'model'>;
  logger: Logger;
}

type FormValue = string | File | Array<string | File>;

function statusFor(error: unknown): 400 | 502 | 500 {
  if (
    error instanceof InvalidRequestError ||
    error instanceof UnparseableDocumentError ||
    error instanceof UnsupportedDocumentError
  ) {
    return 400;
  }
  if (error instanceof EmbeddingError || error instanceof VectorDimensionError) {
    return 502;
  }
  return 500;
}

// A blank file input arrives as an unnamed empty File; a named empty upload is kept
// so the parser can report it.
function filesOf(value: FormValue | undefined): File[] {
  if (value === undefined) return [];
  const values = Array.isArray(value) ? value : [value];
  return values.filter((v): v is File => typeof v !== 'string' && (v.size > 0 || v.name !== ''));
}

async function toUpload(file: File): Promise<UploadedFile> {
  return {
    name: file.name,
    bytes: Buffer.from(await file.arrayBuffer()),
    mimeType: file.type || undefined,
  };
}

export function createApp({ pipeline, runs, store, llm, logger }: AppDeps) {
  const app = new Hono();

  app.use('*', requestLogger((message) => logger.info(message)));

  // Multipart: jobDescription (file) or jobDescriptionText, plus one or more resumes
  app.post('/screen', async (c) => {
    try {
      const body = await c.req.parseBody({ all: true });

      const [jdFile] = filesOf(body['jobDescription']);
      const jdText = body['jobDescriptionText'];
      let jobDescription: JobDescriptionInput;
      if (typeof jdText === 'string' && jdText.trim()) {
        jobDescription = { text: jdText };
      } else if (jdFile) {
        jobDescription = await toUpload(jdFile);
      } else {
        return c.json({ error: 'Please upload a JD file or provide jobDescriptionText.' }, 400);
      }

      const resumeFiles = [...filesOf(body['resumes']), ...filesOf(body['resumes[]'])];
      if (resumeFiles.length === 0) {
        return c.json({ error: 'Please upload at least one resume.' }, 400);
      }
      const resumes = await Promise.all(resumeFiles.map(toUpload));

      const run = await pipeline.run({ jobDescription, resumes });
      runs.save(run);
      return c.json(run);
    } catch (e) {
      const status = statusFor(e);
      if (status === 500) {
        logger.error(`Screening failed: ${errorMessage(e)}`);
      }
      return c.json({ error: errorMessage(e) }, status);
    }
  });

  app.get('/runs/:runId', (c) => {
    const run = runs.get(c.req.param('runId'));
    if (!run) {
      return c.json({ error: 'Run not found' }, 404);
    }
    return c.json(run);
  });

  app.get('/runs/:runId/csv', (c) => {
    const run = runs.get(c.req.param('runId'));
    if (!run) {
      return c.json({ error: 'Run not found' }, 404);
    }
    return c.body(resultsToCsv(run.results), 200, {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${CSV_FILE_NAME}"`,
    });
  });

  app.get('/entries', (c) => {
    const entries = store.getAllEntries();
    return c.json({ entries, count: entries.length });
  });

  app.get('/health', async (c) => {
    const llmStatus = await llm.healthCheck();
    return c.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      llm: { model: llm.model, ...llmStatus },
    });
  });

  return app;
}
