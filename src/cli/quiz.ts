#!/usr/bin/env node
import readline from "readline";
import { parseArgs } from "util";
import dotenv from "dotenv";
import { loadConfig } from "../config";
import { createContainer } from "../api/container";
import { isQuizError } from "../domain/errors";
import { PublicQuestion, CHOICE_LETTERS } from "../domain/question";
import { verdictMessage } from "../domain/feedbackMessages";
import { QuizOrchestrator, QuizResponse } from "../services/quizOrchestrator";
import { playAudio, recordAnswer } from "./voice";

function ask(rl: readline.Interface, prompt: string): Promise<string> {
  return new Promise((resolve) => rl.question(prompt, resolve));
}

function printQuestion(question: PublicQuestion, index: number, total: number): void {
  console.log(`\nQuestion ${index}/${total} [${question.topic}, ${question.difficulty}]`);
  console.log(question.question);
  if (question.possibleAnswers) {
    const { possibleAnswers } = question;
    for (const letter of CHOICE_LETTERS) {
      console.log(`  ${letter}) ${possibleAnswers[letter]}`);
    }
  }
}

function printResult(response: QuizResponse): void {
  const { evaluation } = response;
  if (evaluation) {
    console.log(`\n${verdictMessage(evaluation.kind, response.session.language)} The answer: ${evaluation.correctAnswer}`);
    if (evaluation.rationale && evaluation.tier === "judge") {
      console.log(`(${evaluation.rationale})`);
    }
  }
  const extras = response.feedbackReceived.filter((f) => !f.startsWith("answer:") && f !== "skipped question");
  if (extras.length > 0) {
    console.log(`Noted: ${extras.join(", ")}`);
  }
}

async function takeTurn(
  rl: readline.Interface,
  orchestrator: QuizOrchestrator,
  sessionId: string,
  speak: boolean
): Promise<QuizResponse> {
  for (;;) {
    const typed = (await ask(rl, "> ")).trim();
    try {
      if (typed.toLowerCase() === "v" || typed.toLowerCase() === "voice") {
        if (!orchestrator.voiceEnabled) {
          console.log("(Voice input requires OPENAI_API_KEY)");
          continue;
        }
        const audio = await recordAnswer();
        if (!audio) continue;
        console.log("⏳ Transcribing...");
        const response = await orchestrator.submitVoice(sessionId, {
          audio: { bytes: audio, filename: "answer.wav" },
          audioReply: speak,
        });
        console.log(`\n💬 ${response.feedbackReceived[0]}`);
        return response;
      }
      return await orchestrator.submitInput(sessionId, { text: typed, audioReply: speak });
    } catch (error) {
      if (isQuizError(error) && error.code !== "SESSION_EXPIRED" && error.code !== "SESSION_NOT_FOUND") {
        console.log(`${error.message}. Please try again.`);
        continue;
      }
      throw error;
    }
  }
}

async function main(): Promise<void> {
  dotenv.config();

  const { values } = parseArgs({
    options: {
      questions: { type: "string", short: "n", default: "5" },
      difficulty: { type: "string", short: "d", default: "medium" },
      language: { type: "string", short: "l", default: "en" },
      category: { type: "string", short: "c" },
      speak: { type: "boolean", short: "s", default: false },
    },
  });

  const config = loadConfig();
  const { orchestrator } = createContainer(config);
  const speak = values.speak === true && config.openaiApiKey !== undefined;

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  try {
    const session = orchestrator.createSession({
      maxQuestions: Number(values.questions),
      difficulty: values.difficulty,
      language: values.language,
      category: values.category,
    });

    console.log("\nTrivia time! Answer by typing, or type 'v' to speak.");
    console.log("You can also say things like 'skip', 'harder', 'no more history' or 'quit'.");

    let response = await orchestrator.start(session.id, { audioReply: speak });

    while (response.currentQuestion) {
      printQuestion(response.currentQuestion, response.session.questionsAnswered + 1, response.session.maxQuestions);
      if (response.audio?.question) playAudio(response.audio.question);

      response = await takeTurn(rl, orchestrator, session.id, speak);

      printResult(response);
      if (response.audio?.feedback) playAudio(response.audio.feedback);
    }

    const [player] = response.session.participants;
    console.log(`\n${response.message}`);
    console.log(`Final score: ${player.score} (${player.correctCount} correct of ${response.session.questionsAnswered})\n`);
    orchestrator.endSession(session.id);
  } finally {
    rl.close();
  }
}

main().catch((error) => {
  console.error(isQuizError(error) ? error.message : error);
  process.exit(1);
});
