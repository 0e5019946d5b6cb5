import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { ChatCompletionReply, NarrativeSummarizer } from "../src/llm/llm-service";
import { VALUATION_SYSTEM_PROMPT, buildValuationUserPrompt } from "../src/llm/prompts/valuation-prompts";
import { DcfAssumptions, DcfResult } from "../src/types";
import { FakeChatClient, TEST_LLM as LLM, replyWith } from "./fakes";
import { makeTempDir } from "./helpers";

const ASSUMPTIONS: DcfAssumptions = {
  growthRate: 0.05,
  discountRate: 0.1,
  terminalGrowthRate: 0.02,
  projectionYears: 5,
};

const RESULT: DcfResult = {
  projections: [],
  terminalValue: 0,
  discountedTerminalValue: 0,
  enterpriseValue: 1234.567,
  intrinsicValuePerShare: 12.5,
};

describe("buildValuationUserPrompt", () => {
  it("lays out the DCF summary line by line", () => {
    assert.equal(
      buildValuationUserPrompt("TEST", ASSUMPTIONS, RESULT),
      [
        "Here is the DCF summary for TEST:",
        "Revenue Growth Rate: 5.00%",
        "Discount Rate: 10.00%",
        "Terminal Growth Rate: 2.00%",
        "Enterprise Value: $1,234.57",
        "Intrinsic Value/Share: $12.50",
        "Current Price: N/A",
        "",
      ].join("\n")
    );
  });
});

describe("NarrativeSummarizer", () => {
  it("is disabled without an API key", async () => {
    const summarizer = new NarrativeSummarizer({ llm: { ...LLM, apiKey: "" } });

    assert.equal(summarizer.isEnabled(), false);
    assert.deepEqual(await summarizer.summarizeValuation("TEST", ASSUMPTIONS, RESULT), {
      status: "disabled",
      reason: "No LLM API key configured (set LLM_API_KEY or GROQ_API_KEY)",
    });
  });

  it("sends the system and user prompts and trims the reply", async () => {
    const client = new FakeChatClient(replyWith("  Looks undervalued.\n"));
    const summarizer = new NarrativeSummarizer({ llm: LLM, client });

    const narrative = await summarizer.summarizeValuation("TEST", ASSUMPTIONS, RESULT);

    assert.deepEqual(narrative, { status: "ok", text: "Looks undervalued." });
    assert.deepEqual(client.requests, [
      {
        model: "test-model",
        messages: [
          { role: "system", content: VALUATION_SYSTEM_PROMPT },
          { role: "user", content: buildValuationUserPrompt("TEST", ASSUMPTIONS, RESULT) },
        ],
      },
    ]);
  });

  it("reports a failed request instead of throwing", async () => {
    const client = new FakeChatClient(async () => {
      throw new Error("401 invalid api key");
    });
    const summarizer = new NarrativeSummarizer({ llm: LLM, client });

    assert.deepEqual(await summarizer.summarizeValuation("TEST", ASSUMPTIONS, RESULT), {
      status: "failed",
      error: "401 invalid api key",
    });
  });

  it("treats an empty reply as a failure", async () => {
    const summarizer = new NarrativeSummarizer({ llm: LLM, client: new FakeChatClient(replyWith(null)) });

    assert.deepEqual(await summarizer.summarizeValuation("TEST", ASSUMPTIONS, RESULT), {
      status: "failed",
      error: "LLM returned empty content",
    });
  });

  it("gives up after the configured timeout", async () => {
    const client = new FakeChatClient(() => new Promise<ChatCompletionReply>(() => undefined));
    const summarizer = new NarrativeSummarizer({ llm: { ...LLM, timeoutMs: 20 }, client });

    assert.deepEqual(await summarizer.summarizeValuation("TEST", ASSUMPTIONS, RESULT), {
      status: "failed",
      error: "LLM request timed out after 20ms",
    });
  });

  it("saves the interaction when logging is on", async () => {
    const outputDir = makeTempDir("llm-log");
    const summarizer = new NarrativeSummarizer({
      llm: { ...LLM, logInteractions: true },
      client: new FakeChatClient(replyWith("Fairly valued.")),
      outputDir,
    });

    await summarizer.summarizeValuation("TEST", ASSUMPTIONS, RESULT);

    const files = fs.readdirSync(path.join(outputDir, "chat"));
    assert.equal(files.length, 1);
    assert.match(files[0], /_VALUATION\.md$/);
    const content = fs.readFileSync(path.join(outputDir, "chat", files[0]), "utf-8");
    assert.ok(content.includes("Model: test-model"));
    assert.ok(content.includes("```text\nFairly valued.\n```"));
  });
});
