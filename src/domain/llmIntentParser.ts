import OpenAI from "openai";
import { IntentParser, RuleBasedIntentParser } from "./intentParser";
import { Intent, IntentBundle, guardAnswers, isRating, matchCommand } from "./intent";
import { isRecord, isStringArray, optionalString } from "./guards";
import { withTimeout } from "../services/timeout";

const SYSTEM_PROMPT = `You classify what a quiz player said into intents. One utterance can contain several intents.

Intent types:
- "answer": the player's answer to the current question. Extract only the answer itself, never the question text. At most 100 characters.
- "skip": the player wants to skip (skip, pass, next, "I don't know").
- "quit": the player wants to stop the quiz.
- "rating": the player comments on the question. Negative sentiment ("boring", "too easy", "too hard", "don't like it") is rating 1, positive ("great question", "love it") is 5, an explicit number is that number.
- "preference_change": the player wants fewer or more questions about a topic, or harder/easier questions.
- "unclear": anything else. It is ignored.

Examples:
- "London. No more geography" -> answer "London", preference_change avoid_topics ["geography"]
- "Paris, but too easy" -> answer "Paris", rating 1, preference_change difficulty "harder"
- "Berlin. Great question!" -> answer "Berlin", rating 5
- "skip" -> skip

Respond with JSON only:
{
  "intents": [
    {
      "intent_type": "answer" | "skip" | "quit" | "rating" | "preference_change" | "unclear",
      "extracted_data": {
        "answer": "text",
        "rating": 1-5,
        "feedback": "text",
        "avoid_topics": ["topic"],
        "prefer_topics": ["topic"],
        "difficulty": "harder" | "easier" | "easy" | "medium" | "hard"
      }
    }
  ]
}`;

/**
 * Map the model's JSON onto intents. Returns null when the payload does
 * not have the expected shape at all.
 */
export function toIntents(payload: unknown): Intent[] | null {
  if (!isRecord(payload) || !Array.isArray(payload.intents)) {
    return null;
  }

  const intents: Intent[] = [];

  for (const raw of payload.intents) {
    if (!isRecord(raw) || typeof raw.intent_type !== "string") continue;
    const data = isRecord(raw.extracted_data) ? raw.extracted_data : {};

    switch (raw.intent_type) {
      case "answer": {
        const text = optionalString(data.answer);
        if (text) intents.push({ type: "answer", text });
        break;
      }
      case "skip":
        intents.push({ type: "skip" });
        break;
      case "quit":
        intents.push({ type: "quit" });
        break;
      case "rating": {
        const rating = typeof data.rating === "number" ? Math.round(data.rating) : NaN;
        if (isRating(rating)) {
          intents.push({ type: "rating", rating, feedback: optionalString(data.feedback) });
        }
        break;
      }
      case "preference_change": {
        if (isStringArray(data.avoid_topics)) {
          for (const topic of data.avoid_topics) {
            if (topic.trim()) intents.push({ type: "topic_preference", action: "exclude", topic: topic.trim() });
          }
        }
        if (isStringArray(data.prefer_topics)) {
          for (const topic of data.prefer_topics) {
            if (topic.trim()) intents.push({ type: "topic_preference", action: "prefer", topic: topic.trim() });
          }
        }
        const difficulty = typeof data.difficulty === "string" ? data.difficulty.toLowerCase() : "";
        if (difficulty === "harder") {
          intents.push({ type: "difficulty", change: { kind: "step", delta: 1 } });
        } else if (difficulty === "easier") {
          intents.push({ type: "difficulty", change: { kind: "step", delta: -1 } });
        } else if (difficulty === "easy" || difficulty === "medium" || difficulty === "hard") {
          intents.push({ type: "difficulty", change: { kind: "set", level: difficulty } });
        }
        break;
      }
      default:
        // unclear, explanation requests and anything unknown are ignored
        break;
    }
  }

  return intents;
}

/**
 * LLMIntentParser asks OpenAI to split an utterance into intents.
 *
 * Exact commands ("skip", "quit") never reach the model. Any failure
 * (timeout, API error, unreadable JSON) falls back to the rule-based parser,
 * so parse() always resolves.
 */
export class LLMIntentParser implements IntentParser {
  private client: OpenAI;
  private model: string;
  private timeoutMs: number;
  private fallback = new RuleBasedIntentParser();

  constructor(apiKey?: string, model: string = "gpt-4o-mini", timeoutMs: number = 6000) {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY,
    });
    this.model = model;
    this.timeoutMs = timeoutMs;
  }

  async parse(utterance: string, groundingQuestion?: string, signal?: AbortSignal): Promise<IntentBundle> {
    const trimmed = utterance.trim();
    if (!trimmed) {
      return { intents: [], source: "rules" };
    }

    const command = matchCommand(trimmed);
    if (command) {
      return { intents: [command], source: "rules" };
    }

    const userPrompt = `Current question: ${groundingQuestion || "No question asked yet"}
Player said: ${trimmed}

Classify and return JSON:`;

    try {
      const completion = await withTimeout(
        this.client.chat.completions.create(
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
        ),
        this.timeoutMs,
        "Intent parsing"
      );

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new Error("No response from LLM");
      }

      const payload: unknown = JSON.parse(content);
      const intents = toIntents(payload);
      if (!intents) {
        throw new Error("Unexpected intent payload shape");
      }

      return { intents: guardAnswers(intents, groundingQuestion), source: "llm" };
    } catch (error) {
      console.warn(
        "[IntentParser] LLM parsing failed, using rule-based fallback:",
        error instanceof Error ? error.message : error
      );
      const bundle = await this.fallback.parse(trimmed, groundingQuestion);
      return { ...bundle, source: "fallback" };
    }
  }
}
