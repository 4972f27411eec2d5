import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorMessage, VectorDimensionError } from '../errors';
import type { Logger } from '../logger';
import { cosineSimilarity } from '../scoring/similarity';
import type { EmbeddingRecord, RecordMetadata } from '../types';

export const VECTORS_FILE = 'vectors.bin';
export const INDEX_FILE = 'index.json';
const BYTES_PER_FLOAT = 4;

const indexSchema = z.object({
  dimension: z.number().int().positive(),
  records: z.array(
    z.object({
      id: z.string(),
      offset: z.number().int().nonnegative(),
      createdAt: z.string(),
      metadata: z
        .object({ role: z.enum(['jd', 'resume']), name: z.string() })
        .catchall(z.union([z.string(), z.number(), z.boolean(), z.null()])),
    })
  ),
});

type PersistedIndex = z.infer<typeof indexSchema>;

/** Every row referenced exactly once, by a distinct id. */
function indexProblem(index: PersistedIndex): string | null {
  const ids = new Set<string>();
  const offsets = new Set<number>();
  for (const entry of index.records) {
    if (entry.offset >= index.records.length) {
      return `record "${entry.id}" points at row ${entry.offset} of ${index.records.length}`;
    }
    if (offsets.has(entry.offset)) return `row ${entry.offset} is referenced twice`;
    if (ids.has(entry.id)) return `id "${entry.id}" appears twice`;
    offsets.add(entry.offset);
    ids.add(entry.id);
  }
  return null;
}

export interface SearchHit {
  record: EmbeddingRecord;
  score: number;
}

/**
 * Flat vector store: one row of float32 values per document in `vectors.bin`,
 * ids and metadata in `index.json`. Every `put` rewrites both files, which is
 * fine for batches of tens of documents. No locking across processes.
 */
export class FileVectorStore {
  private records = new Map<string, EmbeddingRecord>();
  readonly vectorsPath: string;
  readonly indexPath: string;

  constructor(
    readonly directory: string,
    readonly dimension: number,
    private readonly logger: Logger
  ) {
    this.vectorsPath = path.join(directory, VECTORS_FILE);
    this.indexPath = path.join(directory, INDEX_FILE);
  }

  get size(): number {
    return this.records.size;
  }

  async setup() {
    await mkdir(this.directory, { recursive: true });

    let index: PersistedIndex;
    let buffer: Buffer;
    try {
      index = indexSchema.parse(JSON.parse(await readFile(this.indexPath, 'utf-8')));
      buffer = await readFile(this.vectorsPath);
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.info('📝 No persisted vectors found, starting with an empty store');
      } else {
        this.logger.error(`Failed to load persisted vectors, starting fresh: ${errorMessage(error)}`);
      }
      this.records.clear();
      return;
    }

    if (index.dimension !== this.dimension) {
      this.logger.warn(
        `⚠️ Persisted vectors have dimension ${index.dimension}, expected ${this.dimension}; discarding them`
      );
      this.records.clear();
      return;
    }

    const rowBytes = this.dimension * BYTES_PER_FLOAT;
    if (buffer.length !== index.records.length * rowBytes) {
      this.logger.error(
        `Vector file holds ${buffer.length} bytes, index expects ${index.records.length} rows; starting fresh`
      );
      this.records.clear();
      return;
    }

    const problem = indexProblem(index);
    if (problem) {
      this.logger.error(`Vector index is inconsistent (${problem}); starting fresh`);
      this.records.clear();
      return;
    }

    this.records.clear();
    for (const entry of index.records) {
      const vector: number[] = [];
      const start = entry.offset * rowBytes;
      for (let i = 0; i < this.dimension; i++) {
        vector.push(buffer.readFloatLE(start + i * BYTES_PER_FLOAT));
      }
      this.records.set(entry.id, {
        documentId: entry.id,
        vector,
        createdAt: entry.createdAt,
        metadata: entry.metadata,
      });
    }
    this.logger.info(`✅ Loaded ${this.records.size} embeddings from disk`);
  }

  /** Inserts or overwrites the record for `id`, then persists the whole store. */
  async put(id: string, vector: number[], metadata: RecordMetadata): Promise<EmbeddingRecord> {
    if (vector.length !== this.dimension) {
      throw new VectorDimensionError(this.dimension, vector.length);
    }

    const record: EmbeddingRecord = {
      documentId: id,
      vector: [...vector],
      createdAt: new Date().toISOString(),
      metadata,
    };
    this.records.set(id, record);
    await this.persist();
    return record;
  }

  get(id: string): EmbeddingRecord | undefined {
    return this.records.get(id);
  }

  similarity(a: number[], b: number[]): number {
    return cosineSimilarity(a, b);
  }

  similaritySearch(vector: number[], topK?: number): SearchHit[] {
    if (vector.length !== this.dimension) {
      throw new VectorDimensionError(this.dimension, vector.length);
    }

    const hits = [...this.records.values()]
      .map((record) => ({ record, score: cosineSimilarity(vector, record.vector) }))
      .sort((a, b) => b.score - a.score);

    return topK === undefined ? hits : hits.slice(0, topK);
  }

  getAllEntries(): Array<Omit<EmbeddingRecord, 'vector'>> {
    return [...this.records.values()].map(({ vector: _vector, ...rest }) => rest);
  }

  async clear() {
    this.records.clear();
    await this.persist();
    this.logger.info('🗑️ Vector store cleared');
  }

  private async persist() {
    const records = [...this.records.values()];
    const buffer = Buffer.alloc(records.length * this.dimension * BYTES_PER_FLOAT);
    const index: PersistedIndex = { dimension: this.dimension, records: [] };

    records.forEach((record, row) => {
      record.vector.forEach((value, i) => {
        buffer.writeFloatLE(value, (row * this.dimension + i) * BYTES_PER_FLOAT);
      });
      index.records.push({
        id: record.documentId,
        offset: row,
        createdAt: record.createdAt,
        metadata: record.metadata,
      });
    });

    await mkdir(this.directory, { recursive: true });
    await writeFile(this.vectorsPath, buffer);
    await writeFile(this.indexPath, JSON.stringify(index, null, 2), 'utf-8');
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
