import type { FileVectorStore } from '../db/vectorStore';
import type { EmbeddingService } from '../embeddings';
import { errorMessage, InvalidRequestError, StorageError, UnsupportedDocumentError } from '../errors';
import { NOT_PROVIDED, type OllamaClient } from '../llm/ollama';
import type { Logger } from '../logger';
import type { DocumentParser } from '../parsing/parser';
import { profileJob, rankByComposite, scoreCandidate, type JobProfile } from '../scoring/scorer';
import type { DocumentFailure, ParsedDocument, ScoreResult, ScreeningRun, UploadedFile } from '../types';
import { candidateNameFromFile, generateRunId } from '../utils';

export const LLM_PLACEHOLDER = 'LLM commentary unavailable.';
export const PASTED_JD_NAME = 'Pasted JD';

export type JobDescriptionInput = UploadedFile | { text: string; name?: string };

export interface ScreeningRequest {
  jobDescription: JobDescriptionInput;
  resumes: UploadedFile[];
}

export interface PipelineDeps {
  parser: DocumentParser;
  embedder: Pick<EmbeddingService, 'embed'>;
  store: FileVectorStore;
  llm: Pick<OllamaClient, 'analyzeCandidate'>;
  logger: Logger;
}

function isUpload(input: JobDescriptionInput): input is UploadedFile {
  return 'bytes' in input;
}

/**
 * One screening run: parse → embed → store → score → commentary, one resume at
 * a time. A resume that cannot be parsed or embedded is reported as a failure
 * and never scored; an LLM failure only replaces the commentary.
 */
export class ScreeningPipeline {
  private parser: DocumentParser;
  private embedder: Pick<EmbeddingService, 'embed'>;
  private store: FileVectorStore;
  private llm: Pick<OllamaClient, 'analyzeCandidate'>;
  private logger: Logger;

  constructor(deps: PipelineDeps) {
    this.parser = deps.parser;
    this.embedder = deps.embedder;
    this.store = deps.store;
    this.llm = deps.llm;
    this.logger = deps.logger;
  }

  async run(request: ScreeningRequest): Promise<ScreeningRun> {
    if (request.resumes.length === 0) {
      throw new InvalidRequestError('Please upload at least one resume.');
    }

    const runId = generateRunId();
    const startedAt = new Date().toISOString();
    this.logger.info(`🚀 Run ${runId}: screening ${request.resumes.length} resume(s)`);

    const jd = await this.parseJobDescription(request.jobDescription);
    const job = await this.embedJobDescription(jd);

    const results: ScoreResult[] = [];
    const failures: DocumentFailure[] = [];

    for (const upload of request.resumes) {
      const outcome = await this.screenResume(upload, jd, job);
      if ('kind' in outcome) {
        failures.push(outcome);
      } else {
        results.push(outcome);
      }
    }

    const ranked = rankByComposite(results);
    this.logger.info(`✅ Run ${runId}: ${ranked.length} scored, ${failures.length} failed`);

    return {
      runId,
      jobDescription: {
        id: jd.id,
        name: jd.name,
        skills: job.skills,
        experienceYears: job.experienceYears,
      },
      results: ranked,
      failures,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
  }

  private async parseJobDescription(input: JobDescriptionInput): Promise<ParsedDocument> {
    if (isUpload(input)) {
      return this.parser.parse(input, 'jd');
    }
    return this.parser.fromText(input.text, input.name ?? PASTED_JD_NAME, 'jd');
  }

  private async embedJobDescription(jd: ParsedDocument): Promise<JobProfile> {
    const vector = await this.storeVector(jd, await this.embedder.embed(jd.cleanedText));
    return profileJob({ vector, text: jd.cleanedText });
  }

  /** Puts the vector and returns it as read back from the store. */
  private async storeVector(doc: ParsedDocument, vector: number[]): Promise<number[]> {
    try {
      await this.store.put(doc.id, vector, { role: doc.role, name: doc.name, format: doc.format });
    } catch (error) {
      throw new StorageError(`Storing the vector for "${doc.name}" failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const record = this.store.get(doc.id);
    if (!record) {
      throw new StorageError(`Stored vector for "${doc.name}" could not be read back`);
    }
    return record.vector;
  }

  private async screenResume(
    upload: UploadedFile,
    jd: ParsedDocument,
    job: JobProfile
  ): Promise<ScoreResult | DocumentFailure> {
    let resume: ParsedDocument;
    try {
      resume = await this.parser.parse(upload, 'resume');
    } catch (error) {
      const kind = error instanceof UnsupportedDocumentError ? 'unsupported' : 'unparseable';
      this.logger.warn(`Skipping "${upload.name}" (${kind}): ${errorMessage(error)}`);
      return { name: upload.name, kind, message: errorMessage(error) };
    }

    let vector: number[];
    try {
      vector = await this.embedder.embed(resume.cleanedText);
    } catch (error) {
      this.logger.error(`Embedding failed for "${resume.name}": ${errorMessage(error)}`);
      return { name: resume.name, kind: 'embedding', message: errorMessage(error) };
    }

    try {
      vector = await this.storeVector(resume, vector);
    } catch (error) {
      this.logger.error(errorMessage(error));
      return { name: resume.name, kind: 'storage', message: errorMessage(error) };
    }

    const breakdown = scoreCandidate(job, { vector, text: resume.cleanedText });
    const candidateName = candidateNameFromFile(resume.name);

    let commentary = LLM_PLACEHOLDER;
    let feedback = { strengths: NOT_PROVIDED, weaknesses: NOT_PROVIDED, reasoning: NOT_PROVIDED };
    let llmFailed = false;
    try {
      const analysis = await this.llm.analyzeCandidate(candidateName, jd.cleanedText, resume.cleanedText);
      commentary = analysis.commentary;
      feedback = analysis.feedback;
    } catch (error) {
      llmFailed = true;
      this.logger.warn(`LLM analysis failed for "${resume.name}": ${errorMessage(error)}`);
    }

    return {
      resumeId: resume.id,
      resumeName: resume.name,
      ...breakdown,
      commentary,
      feedback,
      llmFailed,
    };
  }
}
