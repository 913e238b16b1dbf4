import type { AppConfig } from "../config.js";
import { isTransient, MalformedResponseError, TransientUpstreamError, UpstreamRejectedError } from "../errors.js";
import { errMessage, logger } from "../logger.js";
import { sleep, withTimeout } from "../utils.js";

export type LlmRequest = {
  /** Short label used in logs, e.g. "relevance" or "intent". */
  purpose: string;
  system: string;
  user: string;
  maxTokens?: number;
  temperature?: number;
};

export interface LlmClient {
  complete(req: LlmRequest): Promise<string>;
}

export type CallOptions = {
  timeoutMs: number;
  retries: number;
  /** Delay before a retry; kept small since every caller has a fallback. */
  backoffMs?: number;
};

/**
 * One LLM call with a timeout, retried only on transient failure. Failures
 * surface as TransientUpstreamError, or UpstreamRejectedError for anything the
 * provider refused, both prefixed with the call's purpose.
 */
export async function callLlm(client: LlmClient, req: LlmRequest, opts: CallOptions): Promise<string> {
  let lastErr: unknown = null;
  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    try {
      return await withTimeout(
        client.complete(req),
        opts.timeoutMs,
        () => new TransientUpstreamError(`${req.purpose}: LLM timeout after ${opts.timeoutMs}ms`)
      );
    } catch (err) {
      lastErr = err;
      const transient = isTransient(err);
      logger.warn("llm.call.failed", { purpose: req.purpose, attempt, transient, error: errMessage(err) });
      if (!transient || attempt >= opts.retries) break;
      await sleep(opts.backoffMs ?? 250);
    }
  }
  if (lastErr instanceof TransientUpstreamError) throw lastErr;
  throw isTransient(lastErr)
    ? new TransientUpstreamError(`${req.purpose}: ${errMessage(lastErr)}`, lastErr)
    : new UpstreamRejectedError(`${req.purpose}: ${errMessage(lastErr)}`, lastErr);
}

export function callOptionsFromConfig(cfg: Pick<AppConfig, "LLM_TIMEOUT_MS" | "LLM_RETRIES">): CallOptions {
  return { timeoutMs: cfg.LLM_TIMEOUT_MS, retries: cfg.LLM_RETRIES };
}

/**
 * Pull the JSON value out of a model reply: tolerates ```json fences and
 * prose around a single object or array.
 */
export function parseJsonReply(text: string): unknown {
  const trimmed = text.trim();
  const candidates: string[] = [trimmed];

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  if (fenced?.[1]) candidates.push(fenced[1].trim());

  const objStart = trimmed.indexOf("{");
  const objEnd = trimmed.lastIndexOf("}");
  if (objStart >= 0 && objEnd > objStart) candidates.push(trimmed.slice(objStart, objEnd + 1));

  const arrStart = trimmed.indexOf("[");
  const arrEnd = trimmed.lastIndexOf("]");
  if (arrStart >= 0 && arrEnd > arrStart) candidates.push(trimmed.slice(arrStart, arrEnd + 1));

  for (const c of candidates) {
    try {
      const v: unknown = JSON.parse(c);
      if (v !== null && typeof v === "object") return v;
    } catch {
      // next candidate
    }
  }
  throw new MalformedResponseError("reply is not a JSON object or array", text.slice(0, 500));
}

function contentToText(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return String(content ?? "");
  return content
    .map((part: unknown) => {
      if (typeof part === "string") return part;
      if (typeof part === "object" && part !== null && "text" in part && typeof part.text === "string") return part.text;
      return "";
    })
    .join("");
}

/**
 * ChatOpenAI-backed client. The LangChain packages load lazily so commands
 * that never reach the model skip the import.
 */
export function createOpenAiClient(cfg: Pick<AppConfig, "OPENAI_API_KEY" | "LLM_MODEL">): LlmClient {
  return {
    async complete(req: LlmRequest): Promise<string> {
      const { ChatOpenAI } = await import("@langchain/openai");
      const { HumanMessage, SystemMessage } = await import("@langchain/core/messages");

      const model = new ChatOpenAI({
        apiKey: cfg.OPENAI_API_KEY,
        model: cfg.LLM_MODEL,
        temperature: req.temperature ?? 0.2,
        maxTokens: req.maxTokens ?? 1024
      });

      const res = await model.invoke([new SystemMessage(req.system), new HumanMessage(req.user)]);
      return contentToText(res.content);
    }
  };
}

/** Client for LLM_PROVIDER=none: every call fails, so each caller takes its fallback. */
export function createDisabledClient(): LlmClient {
  return {
    async complete(req: LlmRequest): Promise<string> {
      throw new TransientUpstreamError(`${req.purpose}: LLM disabled (LLM_PROVIDER=none)`);
    }
  };
}

export function createLlmClient(cfg: AppConfig): LlmClient {
  return cfg.LLM_PROVIDER === "openai" ? createOpenAiClient(cfg) : createDisabledClient();
}
