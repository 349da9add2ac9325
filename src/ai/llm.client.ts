import fetch from "node-fetch";
import { Logger, errorMessage } from "../config/logger";
import { isRecord } from "../shared/utils/values";
import { SCREENING_SYSTEM_PROMPT } from "./system/screening.system";

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  response_format: {
    type: "json_object";
  };
  max_tokens?: number;
  max_completion_tokens?: number;
}

export interface LlmCallOptions {
  promptName?: string;
}

/**
 * Narrow JSON-generation surface used by the safe call helpers. `LlmClient`
 * implements it; tests pass scripted doubles.
 */
export interface JsonLlmClient {
  generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string>;
  getModelName?(): string;
}

export interface LlmClientOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
}

const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_TEMPERATURE = 0.2;

export class LlmClient implements JsonLlmClient {
  private readonly baseUrl: string;

  constructor(
    private readonly options: LlmClientOptions,
    private readonly logger: Logger,
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  }

  getModelName(): string {
    return this.options.model;
  }

  async generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "structured_json";
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.options.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(this.buildJsonRequestBody(prompt, maxTokens)),
      });
      if (!response.ok) {
        throw new Error(`OpenAI API error: HTTP ${response.status} - ${await response.text()}`);
      }

      const content = extractMessageContent(await response.json());
      if (!content) {
        throw new Error("OpenAI response does not contain message content");
      }
      this.logger.debug("llm.call.completed", {
        promptName,
        model: this.options.model,
        latencyMs: Date.now() - startedAt,
        tokenEstimate: estimateTokenCount(prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        model: this.options.model,
        latencyMs: Date.now() - startedAt,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  buildJsonRequestBody(prompt: string, maxTokens: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.options.model,
      temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
      messages: [
        { role: "system", content: SCREENING_SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      response_format: { type: "json_object" },
    };
    // Reasoning model families reject max_tokens.
    if (usesMaxCompletionTokens(this.options.model)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }
}

export function extractMessageContent(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    return null;
  }
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return null;
  }
  const content = first.message.content;
  return typeof content === "string" && content.trim().length > 0 ? content : null;
}

function estimateTokenCount(prompt: string, output: string): number {
  return Math.max(1, Math.round((prompt.length + output.length) / 4));
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
