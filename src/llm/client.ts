import OpenAI from "openai";
import type { AppLogger } from "../logger/index.js";

export type OracleConfig = {
  apiKey: string;
  baseURL: string;
  model: string;
};

/**
 * 读取可选的二次复核模型配置。
 * 未设置 `ORACLE_API_KEY` 时返回 `undefined`（复核关闭）。
 */
export function loadOracleConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OracleConfig | undefined {
  const apiKey = env.ORACLE_API_KEY?.trim() ?? "";
  if (!apiKey) return undefined;
  const baseURL = (env.ORACLE_BASE_URL?.trim() || "https://api.openai.com/v1").replace(/\/+$/, "");
  const model = env.ORACLE_MODEL?.trim() || "gpt-4o-mini";
  return { apiKey, baseURL, model };
}

export function createOpenAIClient(cfg: OracleConfig): OpenAI {
  return new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL });
}

/**
 * 只声明我们用到的那部分 Chat Completions 接口，`OpenAI` 实例可直接传入，
 * 测试里也可以换成进程内的假实现。
 */
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming
      ): Promise<{
        choices: Array<{ message: { content: string | null } }>;
        usage?: unknown;
      }>;
    };
  };
};

export class LlmOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LlmOutputError";
  }
}

export type ChatJsonOptions = {
  logger: AppLogger;
  client: ChatCompletionsClient;
  model: string;
  messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[];
  temperature?: number;
  maxTokens?: number;
  /** 用于日志追踪（不写正文），例如 `oracle.classify` */
  purpose: string;
};

/**
 * 调用 Chat Completions 并返回解析后的 JSON（类型未校验，由调用方校验）。
 *
 * 实现方式：
 * - 优先带 `response_format: { type: 'json_object' }`；失败则去掉该参数重试，
 *   并从回复中提取最外层 JSON 对象。
 * - 第二次调用的网络错误直接抛出；回复无法解析时抛 {@link LlmOutputError}。
 */
export async function chatJson(opts: ChatJsonOptions): Promise<{ rawText: string; json: unknown }> {
  const t0 = Date.now();
  const log = opts.logger;

  const basePayload: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
    model: opts.model,
    messages: opts.messages,
    temperature: opts.temperature ?? 0.2,
    max_tokens: opts.maxTokens,
  };

  try {
    const resp = await opts.client.chat.completions.create({
      ...basePayload,
      response_format: { type: "json_object" },
    });
    const rawText = resp.choices[0]?.message.content ?? "";
    const json = safeParseJson(rawText);
    log.info("LLM chatJson ok", {
      purpose: opts.purpose,
      ms: Date.now() - t0,
      usage: resp.usage,
    });
    return { rawText, json };
  } catch (err) {
    log.warn("LLM chatJson response_format failed; fallback", {
      purpose: opts.purpose,
      ms: Date.now() - t0,
      error: err instanceof Error ? { name: err.name, message: err.message } : { err },
    });
  }

  const resp2 = await opts.client.chat.completions.create(basePayload);
  const rawText2 = resp2.choices[0]?.message.content ?? "";
  const json2 = safeParseJson(rawText2);
  log.info("LLM chatJson ok (fallback)", {
    purpose: opts.purpose,
    ms: Date.now() - t0,
    usage: resp2.usage,
  });
  return { rawText: rawText2, json: json2 };
}

export function safeParseJson(raw: string): unknown {
  // 允许模型在 JSON 前后附带少量解释文本
  const trimmed = raw.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    const obj = extractFirstJsonObject(trimmed);
    try {
      return JSON.parse(obj);
    } catch {
      throw new LlmOutputError("LLM output is not valid JSON");
    }
  }
}

function extractFirstJsonObject(text: string): string {
  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first === -1 || last === -1 || last <= first) {
    throw new LlmOutputError("LLM output is not valid JSON");
  }
  return text.slice(first, last + 1);
}
