import { createHash } from 'crypto';
import type { DocumentRole } from './types';

/**
 * Deterministic document id: MD5 over role, file name and contents, laid out as a UUID
 * (8-4-4-4-12). Re-uploading the same file yields the same id, so its vector is overwritten.
 */
export function generateDocumentId(role: DocumentRole, name: string, content: Buffer | string): string {
  const hash = createHash('md5').update(role).update('\0').update(name).update('\0').update(content).digest('hex');

  return [
    hash.substring(0, 8),
    hash.substring(8, 12),
    hash.substring(12, 16),
    hash.substring(16, 20),
    hash.substring(20, 32),
  ].join('-');
}

export function generateRunId(): string {
  return `${Date.now()}_${Math.random().toString(36).substring(2, 10)}`;
}

/** Strips the extension and title-cases the rest: "jane_doe-cv.pdf" -> "Jane Doe Cv". */
export function candidateNameFromFile(fileName: string): string {
  const base = fileName.replace(/\.[^./\\]+$/, '');
  const words = base.split(/[\s_\-]+/).filter(Boolean);
  if (words.length === 0) return 'Candidate';
  return words.map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase()).join(' ');
}
