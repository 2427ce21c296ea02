/**
 * @module servers/stores/memory-store
 * @fileoverview Long-term memory storage behind the memory server.
 *
 * The server only needs append, list and nearest-neighbour search, so any
 * vector or document store can sit behind {@link MemoryStore}. The bundled
 * implementation keeps entries in process and ranks them by bag-of-words
 * cosine similarity.
 */

import { randomUUID } from "node:crypto";

export interface MemoryEntry {
  readonly id: string;
  readonly content: string;
  readonly createdAt: number;
}

export interface MemoryMatch extends MemoryEntry {
  /** Similarity in (0, 1]. */
  readonly score: number;
}

export interface MemoryStore {
  add(content: string): Promise<MemoryEntry>;
  /** Best matches first; entries sharing no term with the query are left out. */
  search(query: string, limit: number): Promise<MemoryMatch[]>;
  /** Every entry, oldest first. */
  all(): Promise<MemoryEntry[]>;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Term Vectors
 * ──────────────────────────────────────────────────────────────────────────── */

type TermVector = ReadonlyMap<string, number>;

const TERM = /[\p{L}\p{N}]+/gu;

export function termVector(text: string): TermVector {
  const counts = new Map<string, number>();
  for (const [term] of text.toLowerCase().matchAll(TERM)) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

function norm(vector: TermVector): number {
  let sum = 0;
  for (const count of vector.values()) sum += count * count;
  return Math.sqrt(sum);
}

/** Cosine similarity of two term vectors; 0 when either is empty. */
export function cosineSimilarity(a: TermVector, b: TermVector): number {
  const denominator = norm(a) * norm(b);
  if (denominator === 0) return 0;

  let dot = 0;
  for (const [term, count] of a) dot += count * (b.get(term) ?? 0);
  return dot / denominator;
}

/* ────────────────────────────────────────────────────────────────────────────
 * In-Process Store
 * ──────────────────────────────────────────────────────────────────────────── */

interface IndexedEntry {
  entry: MemoryEntry;
  vector: TermVector;
}

export class InMemoryMemoryStore implements MemoryStore {
  private readonly entries: IndexedEntry[] = [];

  async add(content: string): Promise<MemoryEntry> {
    const entry: MemoryEntry = Object.freeze({ id: randomUUID(), content, createdAt: Date.now() });
    this.entries.push({ entry, vector: termVector(content) });
    return entry;
  }

  async search(query: string, limit: number): Promise<MemoryMatch[]> {
    const queryVector = termVector(query);
    return this.entries
      .map(({ entry, vector }) => ({ ...entry, score: cosineSimilarity(queryVector, vector) }))
      .filter((match) => match.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, limit));
  }

  async all(): Promise<MemoryEntry[]> {
    return this.entries.map(({ entry }) => entry);
  }
}
