import OpenAI from "openai";
import { AnswerJudge, JudgeRequest, JudgeVerdict } from "./answerEvaluator";
import { JudgedKind, isJudgedKind } from "./evaluation";
import { isRecord, optionalString } from "./guards";

const SYSTEM_PROMPT = `You are a fair quiz answer judge. Accept answers that show the player knows the correct information.

Grades:
- "correct": captures the key concept. Accept shorter forms that keep the essential element, common abbreviations, minor misspellings, and more specific correct answers.
- "partially_correct": right general idea but missing an important qualifier or with a minor factual error.
- "partially_incorrect": mentions something related but is mostly wrong.
- "incorrect": wrong, unrelated or nonsensical.

Return JSON:
{
  "result": "correct" | "partially_correct" | "partially_incorrect" | "incorrect",
  "rationale": "<one short sentence>"
}`;

/**
 * Read a grade from free text when the model ignored the JSON format.
 * Longer labels are checked first because "correct" is inside all of them.
 */
export function parseVerdictText(text: string): JudgedKind | null {
  const lower = text.toLowerCase().trim();
  if (isJudgedKind(lower)) return lower;
  if (lower.includes("partially_correct") || lower.includes("partially correct")) return "partially_correct";
  if (lower.includes("partially_incorrect") || lower.includes("partially incorrect")) return "partially_incorrect";
  if (lower.includes("incorrect")) return "incorrect";
  if (lower.includes("correct")) return "correct";
  return null;
}

/**
 * LLMJudge asks OpenAI to grade a free-text answer that did not match
 * the expected answer exactly. Rejects on API errors or unreadable output;
 * the AnswerEvaluator owns the fallback.
 */
export class LLMJudge implements AnswerJudge {
  private client: OpenAI;
  private model: string;
  private timeoutMs: number;

  constructor(apiKey?: string, model: string = "gpt-4o-mini", timeoutMs: number = 6000) {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY,
    });
    this.model = model;
    this.timeoutMs = timeoutMs;
  }

  async judge(request: JudgeRequest, signal?: AbortSignal): Promise<JudgeVerdict> {
    const alternatives = request.alternativeAnswers.length
      ? request.alternativeAnswers.join(", ")
      : "(none)";

    const userPrompt = `Question: ${request.questionText}
Correct answer: ${request.correctAnswer}
Also accepted: ${alternatives}
Player's answer: ${request.candidate}

Grade and return JSON:`;

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: userPrompt },
        ],
        temperature: 0.3,
        response_format: { type: "json_object" },
      },
      { timeout: this.timeoutMs, maxRetries: 0, signal }
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error("No response from LLM");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch {
      const kind = parseVerdictText(content);
      if (kind) return { kind };
      throw new Error(`Unreadable verdict: ${content.slice(0, 80)}`);
    }

    if (isRecord(payload)) {
      const result = typeof payload.result === "string" ? parseVerdictText(payload.result) : null;
      if (result) {
        return { kind: result, rationale: optionalString(payload.rationale) };
      }
    }
    throw new Error(`Unreadable verdict: ${content.slice(0, 80)}`);
  }
}
