/**
 * JSON-file memory store
 *
 * Entries live in one JSON document. Similarity is keyword overlap
 * (Jaccard index over lower-cased word tokens); the oldest entries are
 * evicted once `maxDocuments` is exceeded.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { Clock } from '../types/clock';
import type { MemoryEntry, MemoryMatch, MemoryRetriever, NewMemoryEntry } from '../types/collaborators';
import type { FileSystem } from '../types/file-system';
import type { Logger } from '../types/logger';

const memoryFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(
    z.object({
      id: z.string().min(1),
      content: z.string(),
      source: z.string(),
      metadata: z.record(z.string()),
      createdAt: z.string(),
    })
  ),
});

/** Characters of each match shown by getContext */
export const CONTEXT_PREVIEW_CHARS = 100;

export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((token) => token.length > 1)
  );
}

/**
 * |a ∩ b| / |a ∪ b|, 0 when both are empty
 */
export function jaccard(a: Set<string>, b: Set<string>): number {
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) {
      shared += 1;
    }
  }
  const union = a.size + b.size - shared;
  return union === 0 ? 0 : shared / union;
}

export interface MemoryStoreOptions {
  fs: FileSystem;
  /** Path of the JSON document */
  filePath: string;
  clock: Clock;
  logger: Logger;
  maxDocuments: number;
  generateId?: () => string;
}

export class JsonMemoryStore implements MemoryRetriever {
  private entries: MemoryEntry[] | undefined;
  private readonly generateId: () => string;

  constructor(private readonly options: MemoryStoreOptions) {
    this.generateId = options.generateId ?? randomUUID;
  }

  private async load(): Promise<MemoryEntry[]> {
    if (this.entries) {
      return this.entries;
    }

    const read = await this.options.fs.readFile(this.options.filePath);
    if (!read.ok) {
      if (read.error.code !== 'NOT_FOUND') {
        this.options.logger.warn(`Memory store unreadable, starting empty: ${read.error.message}`);
      }
      this.entries = [];
      return this.entries;
    }

    let data: unknown;
    try {
      data = JSON.parse(read.value);
    } catch (error) {
      this.options.logger.warn(
        `Memory store is not valid JSON, starting empty: ${error instanceof Error ? error.message : String(error)}`
      );
      this.entries = [];
      return this.entries;
    }

    const parsed = memoryFileSchema.safeParse(data);
    if (!parsed.success) {
      this.options.logger.warn('Memory store has an unexpected shape, starting empty', {
        errors: parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
      this.entries = [];
      return this.entries;
    }

    this.entries = parsed.data.entries;
    return this.entries;
  }

  async search(query: string, limit: number): Promise<MemoryMatch[]> {
    const entries = await this.load();
    const queryTokens = tokenize(query);

    return entries
      .map((entry, index) => ({ entry, index, score: jaccard(queryTokens, tokenize(entry.content)) }))
      .filter((match) => match.score > 0)
      .sort((a, b) => b.score - a.score || b.index - a.index)
      .slice(0, Math.max(0, limit))
      .map(({ entry, score }) => ({ entry: { ...entry, metadata: { ...entry.metadata } }, score }));
  }

  async getContext(query: string, limit: number): Promise<string> {
    const matches = await this.search(query, limit);
    if (matches.length === 0) {
      return '';
    }

    const lines = ['Relevant context from memory:'];
    for (const { entry, score } of matches) {
      const preview =
        entry.content.length > CONTEXT_PREVIEW_CHARS
          ? `${entry.content.slice(0, CONTEXT_PREVIEW_CHARS)}...`
          : entry.content;
      lines.push(`- ${preview} (similarity: ${score.toFixed(2)})`);
    }
    return lines.join('\n');
  }

  async save(newEntry: NewMemoryEntry): Promise<MemoryEntry> {
    const entries = await this.load();
    const entry: MemoryEntry = {
      id: this.generateId(),
      content: newEntry.content,
      source: newEntry.source ?? '',
      metadata: { ...newEntry.metadata },
      createdAt: this.options.clock.iso(),
    };

    entries.push(entry);
    const evicted = entries.length - this.options.maxDocuments;
    if (evicted > 0) {
      entries.splice(0, evicted);
    }

    const written = await this.options.fs.writeFile(
      this.options.filePath,
      JSON.stringify({ version: 1, entries }, null, 2) + '\n',
      { createParents: true }
    );
    if (!written.ok) {
      throw new Error(`Failed to save memory: ${written.error.message}`);
    }

    this.options.logger.event('memory_saved', `Memory saved from ${entry.source || 'unknown source'}`, {
      memoryId: entry.id,
      evicted: Math.max(0, evicted),
    });
    return { ...entry, metadata: { ...entry.metadata } };
  }

  /**
   * Number of stored entries
   */
  async size(): Promise<number> {
    return (await this.load()).length;
  }
}
