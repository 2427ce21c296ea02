/**
 * @module router/llm-classifier
 * @fileoverview {@link Classifier} and conversational fallback backed by an
 * OpenAI-compatible chat API.
 *
 * OpenAI and Ollama both speak the chat-completions protocol; which one is
 * used depends only on `baseURL`:
 *
 * | LLM_BASE_URL                  | Backend           |
 * | ----------------------------- | ----------------- |
 * | (unset)                       | api.openai.com    |
 * | `http://localhost:11434/v1`   | local Ollama      |
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText, type CoreMessage, type LanguageModel } from "ai";
import { config } from "../config.js";
import type { Classifier, ClassifierMessage } from "./intent-router.js";

export interface LlmOptions {
  /** @default config.llmModel */
  model?: string;
  /** @default config.llmBaseUrl */
  baseURL?: string;
  /** @default config.llmApiKey */
  apiKey?: string;
}

/** Answers a request no tool applies to. */
export type ConversationalResponder = (userText: string) => Promise<string>;

const CONVERSATION_SYSTEM =
  "You are a helpful personal assistant. Answer briefly. " +
  "You cannot save memories, manage tasks or read the calendar in this reply.";

/** Chat model for the configured provider. */
export function createChatModel(options: LlmOptions = {}): LanguageModel {
  const provider = createOpenAI({
    baseURL: options.baseURL ?? config.llmBaseUrl,
    apiKey: options.apiKey ?? config.llmApiKey,
  });
  return provider.chat(options.model ?? config.llmModel);
}

function toCoreMessage(message: ClassifierMessage): CoreMessage {
  return message.role === "user"
    ? { role: "user", content: message.content }
    : { role: "assistant", content: message.content };
}

/**
 * Classifier that sends the router's prompt to the chat model at
 * temperature 0 and returns the reply text unchanged.
 */
export function createLlmClassifier(model: LanguageModel = createChatModel()): Classifier {
  return async (prompt) => {
    const { text } = await generateText({
      model,
      system: prompt.system,
      messages: prompt.messages.map(toCoreMessage),
      temperature: 0,
    });
    return text;
  };
}

export function createConversationalResponder(model: LanguageModel = createChatModel()): ConversationalResponder {
  return async (userText) => {
    const { text } = await generateText({
      model,
      system: CONVERSATION_SYSTEM,
      prompt: userText,
    });
    return text;
  };
}
