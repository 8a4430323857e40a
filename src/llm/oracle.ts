import { z } from "zod";
import type { AppLogger } from "../logger/index.js";
import type { DetectionLabel } from "../report/schema.js";
import {
  chatJson,
  createOpenAIClient,
  LlmOutputError,
  loadOracleConfigFromEnv,
  type ChatCompletionsClient,
} from "./client.js";
import { buildOracleMessages } from "./prompts.js";

export type OracleVerdict = {
  label: DetectionLabel;
  /** 模型给出的 AI 概率（0..1） */
  probability: number;
  rationale: string;
};

/**
 * 外部"第二意见"端口：可能失败，结果只用于展示，不参与启发式打分。
 */
export interface TextOracle {
  readonly name: string;
  classify(text: string): Promise<OracleVerdict>;
}

export class OracleDisabledError extends Error {
  constructor() {
    super("Secondary check is not configured");
    this.name = "OracleDisabledError";
  }
}

export class OracleReplyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OracleReplyError";
  }
}

/** 默认实现：未配置模型时使用，始终拒绝 */
export class DisabledOracle implements TextOracle {
  readonly name = "disabled";

  classify(): Promise<OracleVerdict> {
    return Promise.reject(new OracleDisabledError());
  }
}

const verdictSchema = z.object({
  label: z.enum(["AI-written", "Human-written"]),
  probability: z.number().min(0).max(1),
  rationale: z.string(),
});

export class OpenAIOracle implements TextOracle {
  readonly name = "openai";

  constructor(
    private readonly params: {
      logger: AppLogger;
      client: ChatCompletionsClient;
      model: string;
    }
  ) {}

  async classify(text: string): Promise<OracleVerdict> {
    let json: unknown;
    try {
      ({ json } = await chatJson({
        logger: this.params.logger,
        client: this.params.client,
        model: this.params.model,
        purpose: "oracle.classify",
        temperature: 0.1,
        messages: buildOracleMessages(text),
      }));
    } catch (err) {
      if (err instanceof LlmOutputError) throw new OracleReplyError(err.message);
      throw err;
    }

    const parsed = verdictSchema.safeParse(json);
    if (!parsed.success) {
      throw new OracleReplyError(`Unexpected oracle reply: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }
}

export function createOracleFromEnv(logger: AppLogger, env: NodeJS.ProcessEnv = process.env): TextOracle {
  const cfg = loadOracleConfigFromEnv(env);
  if (!cfg) return new DisabledOracle();
  return new OpenAIOracle({ logger, client: createOpenAIClient(cfg), model: cfg.model });
}

export type SecondaryCheck =
  | { status: "ok"; oracle: string; verdict: OracleVerdict }
  | { status: "disabled" }
  | { status: "failed"; oracle: string; message: string }
  | { status: "unparsable"; oracle: string; message: string };

/**
 * 执行二次复核并把所有失败收敛为 {@link SecondaryCheck}，从不抛出。
 *
 * 注意：失败/无法解析的回复不会被当成任何标签或概率。
 */
export async function runSecondaryCheck(
  oracle: TextOracle,
  text: string,
  logger: AppLogger
): Promise<SecondaryCheck> {
  const t0 = Date.now();
  try {
    const verdict = await oracle.classify(text);
    logger.info("Secondary check ok", { oracle: oracle.name, ms: Date.now() - t0 });
    return { status: "ok", oracle: oracle.name, verdict };
  } catch (err) {
    if (err instanceof OracleDisabledError) return { status: "disabled" };
    const message = err instanceof Error ? err.message : String(err);
    if (err instanceof OracleReplyError) {
      logger.warn("Secondary check reply unparsable", { oracle: oracle.name, message });
      return { status: "unparsable", oracle: oracle.name, message };
    }
    logger.warn("Secondary check failed", { oracle: oracle.name, message });
    return { status: "failed", oracle: oracle.name, message };
  }
}
