import { IntentBundle, guardAnswers, recognizeIntents } from "./intent";

export interface IntentParser {
  /**
   * Turn a raw utterance (typed or transcribed) into intents.
   * Implementations must be total: they resolve for every input and
   * never reject. An aborted signal cancels outstanding remote calls.
   */
  parse(utterance: string, groundingQuestion?: string, signal?: AbortSignal): Promise<IntentBundle>;
}

/**
 * RuleBasedIntentParser recognizes commands, ratings, difficulty and topic
 * phrases with fixed phrase lists. Used when no OPENAI_API_KEY is set, and
 * as the fallback of the LLM parser.
 */
export class RuleBasedIntentParser implements IntentParser {
  async parse(utterance: string, groundingQuestion?: string): Promise<IntentBundle> {
    return {
      intents: guardAnswers(recognizeIntents(utterance), groundingQuestion),
      source: "rules",
    };
  }
}
