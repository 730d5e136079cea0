/**
 * Deterministic collaborators shared by the core tests.
 */
import { vi } from 'vitest';
import type { DecisionRequest, DecisionService } from '../consolidation/decisionService';
import type { Logger } from '../logger';
import type { EmbeddingService, Vector } from '../memory/embeddingService';

/**
 * One dimension per concept: a text scores 1 on a concept when it contains any
 * of the concept's keywords (case-insensitive), else 0.
 */
export class KeywordEmbeddingService implements EmbeddingService {
  readonly modelName = 'keyword-concepts';
  readonly calls: string[] = [];

  constructor(private readonly concepts: readonly (readonly string[])[]) {}

  get dimension(): number {
    return this.concepts.length;
  }

  async embed(text: string): Promise<Vector> {
    this.calls.push(text);
    const lower = text.toLowerCase();
    return this.concepts.map(keywords => (keywords.some(keyword => lower.includes(keyword)) ? 1 : 0));
  }

  async embedBatch(texts: string[]): Promise<Vector[]> {
    const vectors: Vector[] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }
    return vectors;
  }
}

export const CONCEPTS = [
  ['postgres', 'database'],
  ['deploy', 'release'],
  ['color', 'theme'],
] as const;

/** Answers with the queued responses in order; an Error entry is thrown instead. */
export class ScriptedDecisionService implements DecisionService {
  readonly modelName = 'scripted';
  readonly requests: DecisionRequest[] = [];

  constructor(private readonly responses: (string | Error)[]) {}

  async decide(request: DecisionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('no scripted response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function decisionsJson(decisions: [number, string][]): string {
  return JSON.stringify(decisions.map(([id, decision]) => ({ id, decision, reason: `because ${decision}` })));
}

/** A clock tests can move forward. */
export class TestClock {
  private current: Date;

  constructor(start: string) {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current.getTime());

  advanceHours(hours: number): void {
    this.current = new Date(this.current.getTime() + hours * 60 * 60 * 1000);
  }

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60 * 1000);
  }
}

export function createSpyLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}
