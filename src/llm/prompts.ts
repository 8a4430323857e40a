import type OpenAI from "openai";

/** 送给模型的正文上限（字符），超出部分截断 */
export const MAX_ORACLE_INPUT_CHARS = 6000;

export function buildOracleMessages(text: string): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  const body = text.length > MAX_ORACLE_INPUT_CHARS ? text.slice(0, MAX_ORACLE_INPUT_CHARS) : text;
  return [
    {
      role: "system",
      content: [
        "You review short passages and judge whether they read as machine-generated or human-written.",
        "Base the judgement on the passage alone: rhythm, word choice, specificity, hedging and structure.",
        "",
        "Reply with a single JSON object and nothing else:",
        '{"label": "AI-written" | "Human-written", "probability": <number 0..1, likelihood the passage is AI-written>, "rationale": "<one or two sentences>"}',
      ].join("\n"),
    },
    {
      role: "user",
      content: `Passage:\n"""\n${body}\n"""`,
    },
  ];
}
