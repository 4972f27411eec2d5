export type DocumentRole = 'jd' | 'resume';

export type DocumentFormat = 'pdf' | 'text';

export interface UploadedFile {
  name: string;
  bytes: Buffer;
  mimeType?: string;
}

export interface ParsedDocument {
  id: string;
  role: DocumentRole;
  name: string;
  format: DocumentFormat;
  rawText: string;
  cleanedText: string;
}

export interface RecordMetadata {
  role: DocumentRole;
  name: string;
  [key: string]: string | number | boolean | null;
}

export interface EmbeddingRecord {
  documentId: string;
  vector: number[];
  createdAt: string;
  metadata: RecordMetadata;
}

export interface CandidateFeedback {
  strengths: string;
  weaknesses: string;
  reasoning: string;
}

export interface SkillMatch {
  ratio: number;
  matched: string[];
  missing: string[];
}

export interface ScoreBreakdown {
  similarity: number;
  skills: SkillMatch;
  experienceYears: number;
  experienceScore: number;
  compositeScore: number;
}

export interface ScoreResult extends ScoreBreakdown {
  resumeId: string;
  resumeName: string;
  commentary: string;
  feedback: CandidateFeedback;
  llmFailed: boolean;
}

export type FailureKind = 'unparseable' | 'unsupported' | 'embedding' | 'storage';

export interface DocumentFailure {
  name: string;
  kind: FailureKind;
  message: string;
}

export interface ScreeningRun {
  runId: string;
  jobDescription: {
    id: string;
    name: string;
    skills: string[];
    experienceYears: number;
  };
  results: ScoreResult[];
  failures: DocumentFailure[];
  startedAt: string;
  finishedAt: string;
}
