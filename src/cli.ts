#!/usr/bin/env node
/**
 * @module cli
 * @fileoverview Interactive chat against every configured backend.
 *
 * ```
 * mcp-orchestrator [--servers servers.json] [--model gpt-4o-mini] [--base-url URL]
 * ```
 *
 * Each line goes through the orchestrator; `/tools`, `/servers` and `/exit`
 * are handled locally. Ctrl+C cancels the request in flight, or exits when
 * there is none.
 */

import { createInterface } from "node:readline";
import { stdin, stdout } from "node:process";
import { parseArgs } from "node:util";
import { config, loadServerEndpoints } from "./config.js";
import { Orchestrator } from "./orchestrator.js";
import { renderEndpoints, renderOutcome, renderProgress, renderTools } from "./render.js";
import { createChatModel, createConversationalResponder, createLlmClassifier } from "./router/llm-classifier.js";
import { formatErrorForMcp } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";

const HELP = `Usage: mcp-orchestrator [options]

Options:
  --servers <path>   Backend server list (default: ${config.serversConfigPath})
  --model <name>     Chat model for routing and replies (default: ${config.llmModel})
  --base-url <url>   OpenAI-compatible API base URL, e.g. http://localhost:11434/v1
  --help             Show this help

Commands inside the chat:
  /tools     List available tools
  /servers   Show backend connection states
  /exit      Quit`;

const log = createLogger("cli");

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      servers: { type: "string", default: config.serversConfigPath },
      model: { type: "string", default: config.llmModel },
      "base-url": { type: "string" },
      help: { type: "boolean", default: false },
    },
  });
  if (values.help) {
    console.log(HELP);
    return;
  }

  const model = createChatModel({
    model: values.model,
    baseURL: values["base-url"] ?? config.llmBaseUrl,
    apiKey: config.llmApiKey,
  });
  const orchestrator = Orchestrator.create(
    { endpoints: await loadServerEndpoints(values.servers) },
    {
      classifier: createLlmClassifier(model),
      responder: createConversationalResponder(model),
    },
  );

  const report = await orchestrator.start();
  for (const failure of report.failed) {
    console.log(`! ${failure.endpoint} unavailable: ${failure.error}`);
  }
  console.log(`Connected to ${report.connected.length} servers. Type /exit to quit.`);

  const rl = createInterface({ input: stdin, output: stdout, prompt: "> " });
  let inFlight: AbortController | undefined;
  rl.on("SIGINT", () => {
    if (inFlight) {
      inFlight.abort();
    } else {
      rl.close();
    }
  });

  rl.prompt();
  try {
    for await (const line of rl) {
      const text = line.trim();
      if (text === "/exit" || text === "/quit") break;

      if (text === "/tools") {
        console.log(renderTools(orchestrator.tools()));
      } else if (text === "/servers") {
        console.log(renderEndpoints(orchestrator.endpoints()));
      } else if (text !== "") {
        inFlight = new AbortController();
        try {
          const outcome = await orchestrator.handle(text, {
            signal: inFlight.signal,
            onProgress: (toolName, progress) => console.log(renderProgress(toolName, progress)),
          });
          console.log(renderOutcome(outcome));
        } catch (error) {
          log.error("Request failed", error);
          console.log(`Error: ${formatErrorForMcp(error)}`);
        } finally {
          inFlight = undefined;
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    await orchestrator.shutdown();
  }
}

main().catch((error: unknown) => {
  log.error("Fatal error", error);
  process.exit(1);
});
