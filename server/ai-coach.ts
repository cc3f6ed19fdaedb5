import { GoogleGenAI } from "@google/genai";
import { fmtKg } from "../lib/format";
import { DEFAULT_COACH_MODEL, DEFAULT_COACH_TIMEOUT_MS } from "./config";
import type { ProgressSummary } from "./progress-tracker";

export const NOT_CONFIGURED_MESSAGE =
  "⚠️ AI Coach is not configured. Please set GEMINI_API_KEY in the environment.";

const SYSTEM_CONTEXT = `You are a knowledgeable fitness coach. You help with:
- personalised training advice
- exercise technique and form cues
- nutrition guidance, with a focus on Indian food
- motivation and accountability
- evidence-based answers to fitness questions

Be warm and direct. Keep answers short and practical.`;

/** Minimal surface of a chat session the coach needs. */
export interface CoachChat {
  sendMessage(params: { message: string }): Promise<{ text?: string }>;
}

export type CoachChatFactory = (apiKey: string, model: string) => CoachChat;

export const geminiChatFactory: CoachChatFactory = (apiKey, model) =>
  new GoogleGenAI({ apiKey }).chats.create({ model });

export interface CoachProfile {
  age?: number | null;
  gender?: string | null;
  goal?: string | null;
  experience?: string | null;
}

export interface AiCoachOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  chatFactory?: CoachChatFactory;
}

export type ProgressInsightInput = Pick<ProgressSummary, "startWeight" | "currentWeight" | "goalWeight"> & {
  weeks?: number | null;
};

function orNA(val: string | number | null | undefined): string {
  return val == null || val === "" ? "N/A" : String(val);
}

export function buildCoachPrompt(message: string, profile?: CoachProfile | null): string {
  let context = SYSTEM_CONTEXT;
  if (profile) {
    context +=
      "\n\nUser Profile:\n" +
      `- Age: ${orNA(profile.age)}\n` +
      `- Gender: ${orNA(profile.gender)}\n` +
      `- Goal: ${orNA(profile.goal)}\n` +
      `- Experience: ${orNA(profile.experience)}\n`;
  }
  return `${context}\n\nUser: ${message}\n\nAI Coach:`;
}

function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`request timed out after ${ms}ms`)), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * One running conversation with the LLM. Every method resolves to display
 * text; failures come back as an error line instead of a rejection.
 */
export class AiCoach {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly chatFactory: CoachChatFactory;
  private chat: CoachChat | null = null;

  constructor(opts: AiCoachOptions) {
    this.apiKey = opts.apiKey.trim();
    this.model = opts.model ?? DEFAULT_COACH_MODEL;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_COACH_TIMEOUT_MS;
    this.chatFactory = opts.chatFactory ?? geminiChatFactory;
  }

  get configured(): boolean {
    return this.apiKey !== "";
  }

  async respond(message: string, profile?: CoachProfile | null): Promise<string> {
    if (!this.configured) return NOT_CONFIGURED_MESSAGE;

    try {
      if (!this.chat) this.chat = this.chatFactory(this.apiKey, this.model);
      const response = await withTimeout(
        this.chat.sendMessage({ message: buildCoachPrompt(message, profile) }),
        this.timeoutMs,
      );
      return response.text ?? "";
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`[coach] ${this.model} request failed: ${msg}`);
      return `❌ Error getting response: ${msg}`;
    }
  }

  workoutAdvice(exercise: string, level: string = "beginner"): Promise<string> {
    return this.respond(
      `Give form tips and common mistakes for the ${exercise} exercise for someone at ${level} level. Keep it concise.`,
    );
  }

  nutritionAdvice(goal: string, dietPreference: string): Promise<string> {
    return this.respond(
      `Give nutrition tips for a ${goal} goal on a ${dietPreference} diet, focusing on Indian food. Keep it concise.`,
    );
  }

  analyzeProgress(progress: ProgressInsightInput): Promise<string> {
    const prompt = [
      "Review this fitness progress and share insights:",
      `Starting Weight: ${fmtKg(progress.startWeight)}`,
      `Current Weight: ${fmtKg(progress.currentWeight)}`,
      `Goal Weight: ${fmtKg(progress.goalWeight)}`,
      `Weeks Elapsed: ${orNA(progress.weeks)}`,
      "",
      "Offer brief encouragement and next steps.",
    ].join("\n");
    return this.respond(prompt);
  }

  /** Drops the conversation; the next message starts a fresh chat. */
  reset(): void {
    this.chat = null;
  }
}
