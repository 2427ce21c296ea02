/**
 * @module router/intent-router
 * @fileoverview Map free text to an ordered plan of tool calls with an
 * external classifier.
 *
 * ## Retry Policy
 * ```
 *  attempt 1 ── ok ──────────────────────────────> RoutePlan
 *     │
 *     │ unknown tool name / unusable JSON
 *     v
 *  attempt 2 (history + correction message) ── ok ─> RoutePlan
 *     │
 *     │ any failure
 *     v
 *  RoutingError   (nothing is dispatched)
 * ```
 * A classifier that throws is not retried: the error is wrapped in a
 * {@link RoutingError} straight away.
 */

import type { RegistrySnapshot } from "../registry/tool-registry.js";
import type { PlannedCall, RoutePlan } from "../types.js";
import { HallucinatedToolError, ParseError, RoutingError, errorMessage } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import {
  buildSystemPrompt,
  formatCorrection,
  parseClassifierReply,
  unknownToolCorrection,
} from "./prompt.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Classifier Contract
 * ──────────────────────────────────────────────────────────────────────────── */

export interface ClassifierMessage {
  role: "user" | "assistant";
  content: string;
}

export interface ClassifierPrompt {
  system: string;
  messages: readonly ClassifierMessage[];
}

/** Returns the model's raw reply text. */
export type Classifier = (prompt: ClassifierPrompt) => Promise<string>;

export interface IntentRouterOptions {
  classifier: Classifier;
  logger?: Logger;
}

/** Attempts per request: the first one plus one correction. */
const MAX_ATTEMPTS = 2;

/* ────────────────────────────────────────────────────────────────────────────
 * Router
 * ──────────────────────────────────────────────────────────────────────────── */

export class IntentRouter {
  private readonly classifier: Classifier;
  private readonly log: Logger;

  constructor(options: IntentRouterOptions) {
    this.classifier = options.classifier;
    this.log = options.logger ?? createLogger("router");
  }

  /**
   * Route `userText` against `snapshot`. An empty plan means no tool applies.
   *
   * @throws {RoutingError} The classifier failed, or erred twice in a row.
   */
  async route(userText: string, snapshot: RegistrySnapshot): Promise<RoutePlan> {
    const system = buildSystemPrompt(snapshot);
    const messages: ClassifierMessage[] = [{ role: "user", content: userText }];
    let lastError: unknown;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      let reply: string;
      try {
        reply = await this.classifier({ system, messages: [...messages] });
      } catch (error) {
        throw new RoutingError(`Classifier failed: ${errorMessage(error)}`, error);
      }
      this.log.debug(`Classifier reply (attempt ${attempt}): ${reply}`);

      try {
        return this.interpret(reply, snapshot);
      } catch (error) {
        if (!(error instanceof HallucinatedToolError || error instanceof ParseError)) throw error;

        lastError = error;
        this.log.warn(`Classifier attempt ${attempt} unusable: ${error.message}`);
        messages.push({ role: "assistant", content: reply });
        messages.push({ role: "user", content: this.correctionFor(error, reply, snapshot) });
      }
    }

    throw new RoutingError(`Routing failed after correction: ${errorMessage(lastError)}`, lastError);
  }

  private interpret(reply: string, snapshot: RegistrySnapshot): RoutePlan {
    const calls = parseClassifierReply(reply);

    const unknown = calls.find((call) => !Object.hasOwn(snapshot.tools, call.tool));
    if (unknown) throw new HallucinatedToolError(unknown.tool);

    return Object.freeze(
      calls.map((call): PlannedCall => Object.freeze({ toolName: call.tool, arguments: call.arguments })),
    );
  }

  private correctionFor(error: HallucinatedToolError | ParseError, reply: string, snapshot: RegistrySnapshot): string {
    if (error instanceof ParseError) return formatCorrection(error.message);

    // Name every invalid tool of the reply, not only the first one found.
    const invalid = parseClassifierReply(reply)
      .map((call) => call.tool)
      .filter((name, index, all) => !Object.hasOwn(snapshot.tools, name) && all.indexOf(name) === index);
    return unknownToolCorrection(invalid, Object.keys(snapshot.tools).sort());
  }
}
