import OpenAI from "openai";
import fs from "fs";
import path from "path";
import { ConfigLoader, LlmConfig } from "../config/config";
import { logger } from "../utils/logger";
import { formatError } from "../utils/errors";
import { DcfAssumptions, DcfResult, NarrativeResult } from "../types";
import { VALUATION_SYSTEM_PROMPT, buildValuationUserPrompt } from "./prompts/valuation-prompts";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionReply {
  choices: ReadonlyArray<{ message: { content: string | null } }>;
  usage?: ChatUsage | null;
}

/** The part of the OpenAI client the summarizer calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: { model: string; messages: ChatMessage[] }): Promise<ChatCompletionReply>;
    };
  };
}

export interface NarrativeSummarizerOptions {
  llm?: LlmConfig;
  outputDir?: string;
  client?: ChatCompletionClient;
}

/**
 * Asks an OpenAI-compatible chat model for commentary on a valuation.
 * Never throws: failures come back as a `failed` result so the numbers
 * that were already computed are unaffected.
 */
export class NarrativeSummarizer {
  private client: ChatCompletionClient | null;
  private model: string;
  private timeoutMs: number;
  private logInteractions: boolean;
  private outputDir: string;

  constructor(options: NarrativeSummarizerOptions = {}) {
    const llmConfig = options.llm ?? ConfigLoader.getInstance().llm;

    if (options.client) {
      this.client = options.client;
    } else if (llmConfig.apiKey) {
      this.client = new OpenAI({
        baseURL: llmConfig.baseUrl,
        apiKey: llmConfig.apiKey,
        timeout: llmConfig.timeoutMs,
        maxRetries: llmConfig.maxRetries,
      });
    } else {
      this.client = null;
    }

    this.model = llmConfig.model;
    this.timeoutMs = llmConfig.timeoutMs;
    this.logInteractions = llmConfig.logInteractions;
    this.outputDir = options.outputDir ?? path.resolve(process.cwd(), "output");
  }

  public isEnabled(): boolean {
    return this.client !== null;
  }

  public async summarizeValuation(
    ticker: string,
    assumptions: DcfAssumptions,
    result: DcfResult
  ): Promise<NarrativeResult> {
    if (!this.client) {
      const reason = "No LLM API key configured (set LLM_API_KEY or GROQ_API_KEY)";
      logger.warn(`[LLM Service] ${reason}; skipping valuation insights`);
      return { status: "disabled", reason };
    }

    const userPrompt = buildValuationUserPrompt(ticker, assumptions, result);

    try {
      logger.info(`[LLM Service] Requesting valuation insights for ${ticker} (${this.model})`);
      const response = await this.withTimeout(
        this.client.chat.completions.create({
          model: this.model,
          messages: [
            { role: "system", content: VALUATION_SYSTEM_PROMPT },
            { role: "user", content: userPrompt },
          ],
        })
      );

      this.logTokenUsage(response.usage);

      const content = response.choices[0]?.message.content;
      if (!content) {
        throw new Error("LLM returned empty content");
      }

      await this.saveInteractionLog("VALUATION", VALUATION_SYSTEM_PROMPT, userPrompt, content);
      return { status: "ok", text: content.trim() };
    } catch (error) {
      const message = formatError(error);
      logger.error(`[LLM Service] Valuation insights failed: ${message}`);
      return { status: "failed", error: message };
    }
  }

  private async withTimeout<T>(promise: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`LLM request timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs
      );
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private logTokenUsage(usage: ChatUsage | null | undefined) {
    if (!usage) return;
    const promptK = (usage.prompt_tokens / 1000).toFixed(3);
    const completionK = (usage.completion_tokens / 1000).toFixed(3);
    const totalK = (usage.total_tokens / 1000).toFixed(3);
    logger.info(`[Token usage] prompt: ${promptK}k | completion: ${completionK}k | total: ${totalK}k`);
  }

  private async saveInteractionLog(
    type: string,
    systemPrompt: string,
    userPrompt: string,
    response: string
  ) {
    if (!this.logInteractions) return;

    try {
      const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
      const logDir = path.join(this.outputDir, "chat");
      await fs.promises.mkdir(logDir, { recursive: true });

      const filePath = path.join(logDir, `${timestamp}_${type}.md`);
      const content = `# LLM Interaction Log - ${type}
Date: ${new Date().toLocaleString()}
Model: ${this.model}

## System Prompt
\`\`\`text
${systemPrompt}
\`\`\`

## User Prompt
\`\`\`text
${userPrompt}
\`\`\`

## Response
\`\`\`text
${response}
\`\`\`
`;

      await fs.promises.writeFile(filePath, content, "utf-8");
      logger.info(`LLM interaction log saved: ${filePath}`);
    } catch (error) {
      logger.error(`Failed to save LLM interaction log: ${formatError(error)}`);
    }
  }
}
