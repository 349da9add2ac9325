import { Logger } from "../config/logger";
import { isRecord } from "../shared/utils/values";
import { JsonLlmClient } from "./llm.client";
import { buildJsonRepairV1Prompt } from "./prompts/utils/json-repair.v1.prompt";

export interface JsonSafeCallArgs<T> {
  llmClient: JsonLlmClient;
  prompt: string;
  maxTokens: number;
  promptName: string;
  schemaHint: string;
  validate: (value: unknown) => value is T;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeJsonErrorCode =
  | "timeout"
  | "transient_failure"
  | "llm_failure"
  | "json_parse_failed"
  | "schema_invalid";

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
      repaired: boolean;
    }
  | {
      ok: false;
      error_code: SafeJsonErrorCode;
      raw?: string;
    };

type CallOutcome = { ok: true; raw: string } | { ok: false; error_code: CallFailureCode };
type CallFailureCode = "timeout" | "transient_failure" | "llm_failure";

const DEFAULT_TIMEOUT_MS = 25_000;
const REPAIR_MIN_TOKENS = 240;
const REPAIR_MAX_TOKENS = 2400;
const TRANSIENT_MARKERS = ["econnreset", "network", "429", "rate limit", "http 500", "http 502", "http 503", "http 504"];

/**
 * Calls the model for a JSON object. One retry on transient failures and one
 * repair round-trip when the output does not parse. Never throws.
 */
export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const first = await callWithRetry(args, args.prompt, args.maxTokens, args.promptName, timeoutMs);
  if (!first.ok) {
    return first;
  }

  const parsed = parseJsonObject(first.raw);
  if (parsed !== null) {
    return args.validate(parsed)
      ? { ok: true, data: parsed, repaired: false }
      : { ok: false, error_code: "schema_invalid", raw: first.raw };
  }

  const repairName = `${args.promptName}_json_repair`;
  args.logger?.debug("llm.safe.repair", { promptName: repairName });
  const repair = await callWithRetry(
    args,
    buildJsonRepairV1Prompt({ schemaHint: args.schemaHint, raw: first.raw }),
    Math.max(REPAIR_MIN_TOKENS, Math.min(REPAIR_MAX_TOKENS, args.maxTokens)),
    repairName,
    timeoutMs,
  );
  if (!repair.ok) {
    return repair;
  }
  const repairedValue = parseJsonObject(repair.raw);
  if (repairedValue === null) {
    return { ok: false, error_code: "json_parse_failed", raw: repair.raw };
  }
  return args.validate(repairedValue)
    ? { ok: true, data: repairedValue, repaired: true }
    : { ok: false, error_code: "schema_invalid", raw: repair.raw };
}

async function callWithRetry<T>(
  args: JsonSafeCallArgs<T>,
  prompt: string,
  maxTokens: number,
  promptName: string,
  timeoutMs: number,
): Promise<CallOutcome> {
  let lastCode: CallFailureCode = "llm_failure";
  for (let attempt = 1; attempt <= 2; attempt += 1) {
    try {
      const raw = await withTimeout(
        args.llmClient.generateStructuredJson(prompt, maxTokens, { promptName }),
        timeoutMs,
      );
      return { ok: true, raw };
    } catch (error) {
      lastCode = classifyFailure(error);
      if (lastCode === "llm_failure" || attempt === 2) {
        break;
      }
      args.logger?.warn("llm.safe.retry.once", {
        promptName,
        modelName: args.llmClient.getModelName?.(),
        reason: lastCode,
      });
    }
  }
  return { ok: false, error_code: lastCode };
}

/** Takes the outermost `{...}` span, so fenced or chatty replies still parse. */
export function parseJsonObject(raw: string): Record<string, unknown> | null {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end <= start) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw.slice(start, end + 1));
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function classifyFailure(error: unknown): CallFailureCode {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  if (message.includes("timeout")) {
    return "timeout";
  }
  return TRANSIENT_MARKERS.some((marker) => message.includes(marker)) ? "transient_failure" : "llm_failure";
}

function normalizeTimeout(value?: number): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? Math.round(value) : DEFAULT_TIMEOUT_MS;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`timeout after ${timeoutMs}ms`)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
