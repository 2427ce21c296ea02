/**
 * @module crawler/frontier
 * @fileoverview Breadth-first crawl frontier.
 *
 * `pop()` always returns an entry of the lowest pending depth, and entries of
 * one depth leave in the order they were pushed. A URL is accepted at most
 * once over the frontier's lifetime.
 */

export interface FrontierEntry {
  readonly url: string;
  readonly depth: number;
}

export class Frontier {
  /** levels[d] holds the pending URLs of depth d; heads[d] is its read index. */
  private readonly levels: string[][] = [];
  private readonly heads: number[] = [];
  private readonly seen = new Set<string>();
  private lowest = 0;
  private count = 0;

  /** Add `url` at `depth`. Returns `false` when it was pushed before. */
  push(url: string, depth: number): boolean {
    if (this.seen.has(url)) return false;
    this.seen.add(url);

    while (this.levels.length <= depth) {
      this.levels.push([]);
      this.heads.push(0);
    }
    this.levels[depth]?.push(url);
    this.count += 1;
    if (depth < this.lowest) this.lowest = depth;
    return true;
  }

  pop(): FrontierEntry | undefined {
    if (this.count === 0) return undefined;

    for (let depth = this.lowest; depth < this.levels.length; depth++) {
      const level = this.levels[depth] ?? [];
      const head = this.heads[depth] ?? 0;
      const url = level[head];
      if (url !== undefined) {
        this.heads[depth] = head + 1;
        this.count -= 1;
        this.lowest = depth;
        return { url, depth };
      }
    }
    return undefined;
  }

  /** `true` when `url` has ever been pushed. */
  has(url: string): boolean {
    return this.seen.has(url);
  }

  get size(): number {
    return this.count;
  }
}
