/**
 * @module registry/tool-registry
 * @fileoverview Aggregated tool catalog across every connected endpoint.
 *
 * ## Ownership
 * Each tool name keeps the list of endpoints that claim it, in the order
 * they first registered it. The last claimant owns the name:
 * ```
 *   refresh(memory)  tools: [search]     search -> memory
 *   refresh(crawler) tools: [search]     search -> crawler   (collision logged)
 *   refresh(memory)  tools: [search]     search -> crawler   (no regain)
 *   remove(crawler)                      search -> memory
 * ```
 *
 * Every mutation builds the new mapping aside and swaps it in with one
 * assignment, so readers never see a half-applied refresh.
 */

import type { RawToolInfo, ToolDescriptor } from "../types.js";
import { RegistryError, UnknownToolError, errorMessage } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { toParameterSpecs } from "./schema.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/** Where the registry reads catalogs from; the session manager fits. */
export interface CatalogSource {
  listTools(handle: { readonly endpoint: string }): Promise<RawToolInfo[]>;
}

/** Tool name -> descriptor of the owning endpoint. Frozen. */
export type ToolMap = Readonly<Record<string, ToolDescriptor>>;

/** Immutable view of the registry handed to the router. */
export interface RegistrySnapshot {
  /** Increments on every swap. */
  readonly version: number;
  readonly tools: ToolMap;
}

export interface ToolCollision {
  readonly toolName: string;
  /** Endpoint that owned the name before. */
  readonly previous: string;
  /** Endpoint that owns it now. */
  readonly winner: string;
  readonly at: number;
}

interface RegistryState {
  /** Catalog of each endpoint, in registration order. */
  readonly catalogs: ReadonlyMap<string, readonly ToolDescriptor[]>;
  /** Tool name -> claiming endpoints, oldest first. */
  readonly claims: ReadonlyMap<string, readonly string[]>;
  readonly snapshot: RegistrySnapshot;
}

const EMPTY_STATE: RegistryState = {
  catalogs: new Map(),
  claims: new Map(),
  snapshot: Object.freeze({ version: 0, tools: Object.freeze({}) }),
};

/* ────────────────────────────────────────────────────────────────────────────
 * Registry
 * ──────────────────────────────────────────────────────────────────────────── */

export class ToolRegistry {
  private state: RegistryState = EMPTY_STATE;
  private readonly collisionLog: ToolCollision[] = [];
  private readonly log: Logger;

  constructor(
    private readonly source: CatalogSource,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger("registry");
  }

  /**
   * Re-read the catalog of `endpoint` and swap in the new aggregate mapping.
   * Returns the endpoint's descriptors, in the order the server listed them.
   *
   * @throws {RegistryError} The catalog query failed; the mapping is unchanged.
   */
  async refresh(endpoint: string): Promise<ToolDescriptor[]> {
    let raw: RawToolInfo[];
    try {
      raw = await this.source.listTools({ endpoint });
    } catch (error) {
      throw new RegistryError(endpoint, `Cannot list tools of '${endpoint}': ${errorMessage(error)}`);
    }

    const descriptors = raw.map((tool) =>
      Object.freeze({
        name: tool.name,
        description: tool.description ?? "",
        parameters: Object.freeze(toParameterSpecs(tool.inputSchema)),
        endpoint,
      }),
    );

    const catalogs = new Map(this.state.catalogs);
    catalogs.set(endpoint, Object.freeze(descriptors));
    this.commit(catalogs, this.reclaim(endpoint, descriptors));

    this.log.info(`Registered ${descriptors.length} tools from '${endpoint}'`);
    return descriptors;
  }

  /** Drop every tool of `endpoint`. Names it won go back to the previous claimant. */
  remove(endpoint: string): void {
    if (!this.state.catalogs.has(endpoint)) return;

    const catalogs = new Map(this.state.catalogs);
    catalogs.delete(endpoint);
    this.commit(catalogs, this.reclaim(endpoint, []));
    this.log.info(`Removed tools of '${endpoint}'`);
  }

  /** Current mapping. The returned object never changes. */
  allTools(): ToolMap {
    return this.state.snapshot.tools;
  }

  /** @throws {UnknownToolError} */
  resolve(name: string): ToolDescriptor {
    const { tools } = this.state.snapshot;
    if (!Object.hasOwn(tools, name)) throw new UnknownToolError(name);
    return tools[name];
  }

  snapshot(): RegistrySnapshot {
    return this.state.snapshot;
  }

  /** Collisions seen so far, oldest first. */
  collisions(): readonly ToolCollision[] {
    return [...this.collisionLog];
  }

  /* ── Internals ────────────────────────────────────────────────────────── */

  /**
   * New claim lists after `endpoint` now offers exactly `descriptors`.
   * A name the endpoint already claimed keeps its position.
   */
  private reclaim(endpoint: string, descriptors: readonly ToolDescriptor[]): Map<string, readonly string[]> {
    const offered = new Set(descriptors.map((descriptor) => descriptor.name));
    const claims = new Map<string, readonly string[]>();

    for (const [name, claimants] of this.state.claims) {
      const kept = offered.has(name) ? claimants : claimants.filter((claimant) => claimant !== endpoint);
      if (kept.length > 0) claims.set(name, kept);
    }

    for (const name of offered) {
      const claimants = claims.get(name) ?? [];
      if (claimants.includes(endpoint)) continue;

      const previous = claimants[claimants.length - 1];
      if (previous !== undefined) {
        const collision: ToolCollision = Object.freeze({ toolName: name, previous, winner: endpoint, at: Date.now() });
        this.collisionLog.push(collision);
        this.log.warn(`Tool '${name}' of '${previous}' is now served by '${endpoint}'`);
      }
      claims.set(name, [...claimants, endpoint]);
    }

    return claims;
  }

  private commit(
    catalogs: ReadonlyMap<string, readonly ToolDescriptor[]>,
    claims: ReadonlyMap<string, readonly string[]>,
  ): void {
    const entries: Array<[string, ToolDescriptor]> = [];
    for (const [name, claimants] of claims) {
      const owner = claimants[claimants.length - 1];
      const descriptor = catalogs.get(owner ?? "")?.find((candidate) => candidate.name === name);
      if (descriptor) entries.push([name, descriptor]);
    }
    const tools: Record<string, ToolDescriptor> = Object.fromEntries(entries);

    this.state = {
      catalogs,
      claims,
      snapshot: Object.freeze({
        version: this.state.snapshot.version + 1,
        tools: Object.freeze(tools),
      }),
    };
  }
}
