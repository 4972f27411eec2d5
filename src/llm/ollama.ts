import fetch, { type RequestInit, type Response } from 'node-fetch';
import { z } from 'zod';
import type { AppConfig } from '../config';
import { errorMessage, LlmError } from '../errors';
import type { Logger } from '../logger';
import { sanitizeLlmText, truncate } from '../parsing/text';
import type { CandidateFeedback } from '../types';
import { buildCandidatePrompt } from './prompts';

export const NOT_PROVIDED = 'Not provided.';

const generatedChunk = z.object({
  response: z.string().optional(),
  text: z.string().optional(),
  output: z.string().optional(),
});

const generateResponse = z.union([z.array(generatedChunk), generatedChunk]);

const modelList = z.union([
  z.object({ models: z.array(z.unknown()) }),
  z.object({ data: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

export interface CandidateAnalysis {
  commentary: string;
  feedback: CandidateFeedback;
}

export interface HealthStatus {
  ok: boolean;
  message: string;
  models: string[] | null;
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

function chunkText(chunk: z.infer<typeof generatedChunk>): string {
  return chunk.response || chunk.text || chunk.output || '';
}

/**
 * Splits "Strengths: / Weaknesses: / Reasoning:" output into its sections.
 * Lines after a header continue that section until the next header.
 */
export function parseFeedback(content: string): CandidateFeedback {
  const sections: CandidateFeedback = { strengths: '', weaknesses: '', reasoning: '' };
  let current: keyof CandidateFeedback | null = null;

  for (const line of content.split(/\r?\n/)) {
    const lower = line.toLowerCase();
    const header: keyof CandidateFeedback | null = lower.includes('strength')
      ? 'strengths'
      : lower.includes('weakness')
        ? 'weaknesses'
        : lower.includes('reason')
          ? 'reasoning'
          : null;

    if (header) {
      current = header;
      const colon = line.indexOf(':');
      sections[current] = colon === -1 ? line.trim() : line.slice(colon + 1).trim();
    } else if (current) {
      sections[current] += ` ${line.trim()}`;
    }
  }

  return {
    strengths: sanitizeLlmText(sections.strengths) || NOT_PROVIDED,
    weaknesses: sanitizeLlmText(sections.weaknesses) || NOT_PROVIDED,
    reasoning: sanitizeLlmText(sections.reasoning) || NOT_PROVIDED,
  };
}

/** "http://host:11434/api/generate" -> "http://host:11434" */
export function baseUrlOf(generateUrl: string): string {
  return generateUrl.split('/api')[0].replace(/\/+$/, '');
}

export function parseModelNames(data: unknown): string[] {
  const parsed = modelList.safeParse(data);
  if (!parsed.success) return [];

  const entries = Array.isArray(parsed.data)
    ? parsed.data
    : 'models' in parsed.data
      ? parsed.data.models
      : parsed.data.data;

  const names: string[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string') {
      names.push(entry);
    } else if (entry && typeof entry === 'object') {
      const named = z.object({ name: z.string() }).or(z.object({ model: z.string() })).safeParse(entry);
      if (named.success) names.push('name' in named.data ? named.data.name : named.data.model);
    }
  }
  return names;
}

/**
 * Client for the local model server's generate endpoint. One blocking POST per
 * candidate: no retries, no streaming.
 */
export class OllamaClient {
  constructor(
    private readonly config: AppConfig['llm'],
    private readonly logger: Logger,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  get model(): string {
    return this.config.model;
  }

  async generate(prompt: string): Promise<string> {
    let raw: string;
    let status: number;
    try {
      const response = await this.fetchFn(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          prompt,
          stream: false,
          options: { temperature: this.config.temperature },
        }),
        timeout: this.config.timeoutMs,
      });
      status = response.status;
      raw = await response.text();
      if (!response.ok) {
        throw new LlmError(`LLM request failed with status ${status}: ${raw.substring(0, 500)}`);
      }
    } catch (error) {
      if (error instanceof LlmError) throw error;
      throw new LlmError(`LLM request failed: ${errorMessage(error)}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new LlmError(`LLM returned invalid JSON: ${raw.substring(0, 500)}`, { cause: error });
    }

    const parsed = generateResponse.safeParse(json);
    if (!parsed.success) {
      throw new LlmError(`LLM response has no generated text (status ${status})`);
    }
    const text = Array.isArray(parsed.data)
      ? parsed.data.map(chunkText).join('')
      : chunkText(parsed.data);

    if (!text.trim()) {
      throw new LlmError('LLM returned an empty response');
    }
    return text;
  }

  async analyzeCandidate(
    candidateName: string,
    jobDescription: string,
    resumeText: string
  ): Promise<CandidateAnalysis> {
    const prompt = buildCandidatePrompt(candidateName, jobDescription, resumeText);
    const content = await this.generate(prompt);
    this.logger.debug(`🤖 ${this.config.model} answered for ${candidateName} (${content.length} chars)`);

    return {
      commentary: truncate(sanitizeLlmText(content), this.config.maxCommentaryChars),
      feedback: parseFeedback(content),
    };
  }

  /** Pings the model server's model list; a 404 still proves it is reachable. */
  async healthCheck(timeoutMs = 2000): Promise<HealthStatus> {
    const base = baseUrlOf(this.config.url);
    let notFound = false;
    for (const endpoint of ['/api/tags', '/api/models']) {
      try {
        const response = await this.fetchFn(`${base}${endpoint}`, { timeout: timeoutMs });
        if (response.ok) {
          return { ok: true, message: 'LLM server reachable', models: parseModelNames(await response.json()) };
        }
        if (response.status === 404) {
          notFound = true;
        }
      } catch (error) {
        this.logger.debug(`Health probe ${endpoint} failed: ${errorMessage(error)}`);
      }
    }
    if (notFound) {
      return { ok: true, message: 'LLM server reachable (no model list)', models: [] };
    }
    return { ok: false, message: 'Unable to reach LLM server', models: null };
  }
}
