import type { InternalAxiosRequestConfig } from "axios";
import { Readable } from "stream";
import { describe, it, expect } from "vitest";

import { AnalysisOrchestrator, synthesisContent } from "../src/analysis/orchestrator";
import { SUMMARY_PROMPT } from "../src/analysis/prompts";
import { IllegalTransitionError, StageMachine } from "../src/analysis/stages";
import { csvToDataset } from "../src/data/csv";
import { CodeSandbox } from "../src/sandbox/sandbox";
import { SessionStore } from "../src/session/sessionStore";
import { CompletionClient } from "../src/utils/completionClient";
import { BadInputError, UpstreamError } from "../src/utils/errors";
import {
  SALES_CSV,
  SALES_DESCRIPTION,
  collect,
  completionBody,
  createTempWorkspace,
  fakeHttp,
  requestBody,
  sseStream,
  systemPromptOf,
  userPromptOf,
  type FakeResponse,
} from "./helpers";

const settings = { apiBaseUrl: "https://llm.example.test/v1", apiKey: "test-secret", modelName: "test-model", temperature: 0 };

const ANALYSIS_PIECES = [
  "Here is the code:\n",
  "```javascript\nfunction testHypothesis(df) { return [true, 0.01]; }\n```",
];
const ANALYSIS_TEXT = ANALYSIS_PIECES.join("");

async function setup(respond: (config: InternalAxiosRequestConfig) => FakeResponse) {
  const store = await SessionStore.open(createTempWorkspace());
  const record = await store.create(csvToDataset(SALES_CSV), "sales.csv");
  const orchestrator = new AnalysisOrchestrator(store, new CodeSandbox({ timeoutMs: 2000, memoryMb: 64 }));
  const { http, requests } = fakeHttp(respond);
  return { orchestrator, sessionId: record.sessionId, gateway: new CompletionClient(settings, http), requests };
}

function analysisThenSummary(analysis: string[], summary: string[]) {
  return (config: InternalAxiosRequestConfig): FakeResponse => ({
    status: 200,
    data: sseStream(systemPromptOf(config) === SUMMARY_PROMPT ? summary : analysis),
  });
}

describe("AnalysisOrchestrator.testHypothesis", () => {
  it("walks every stage in order", async () => {
    const { orchestrator, sessionId, gateway, requests } = await setup(
      analysisThenSummary(ANALYSIS_PIECES, ["##### Units", " grow"])
    );

    const events = await collect(orchestrator.testHypothesis(sessionId, "Units grow over time", gateway));

    expect(events).toEqual([
      { stage: "AnalysisPending", analysis: "" },
      { stage: "AnalysisPending", analysis: "Here is the code:\n" },
      { stage: "AnalysisPending", analysis: ANALYSIS_TEXT },
      {
        stage: "AnalysisComplete",
        analysis: ANALYSIS_TEXT,
        code: "function testHypothesis(df) { return [true, 0.01]; }",
      },
      { stage: "Executing" },
      { stage: "Executed", success: true, p_value: 0.01 },
      { stage: "SummaryPending", summary: "" },
      { stage: "SummaryPending", summary: "##### Units" },
      { stage: "SummaryPending", summary: "##### Units grow" },
      { stage: "Done", success: true, p_value: 0.01, analysis: ANALYSIS_TEXT, summary: "##### Units grow" },
    ]);
    expect(userPromptOf(requests[0])).toBe(`Hypothesis: Units grow over time\n\n${SALES_DESCRIPTION}`);
    expect(userPromptOf(requests[1])).toBe(
      `Hypothesis: Units grow over time\n\n${SALES_DESCRIPTION}\n\nResult: true. p-value: 0.010000`
    );
  });

  it("uses a caller-supplied analysis prompt", async () => {
    const { orchestrator, sessionId, gateway, requests } = await setup(analysisThenSummary(ANALYSIS_PIECES, ["ok"]));

    await collect(orchestrator.testHypothesis(sessionId, "H", gateway, { analysisPrompt: "Custom analyst." }));

    expect(systemPromptOf(requests[0])).toBe("Custom analyst.");
  });

  it("ends in Failed naming the execution stage", async () => {
    const { orchestrator, sessionId, gateway } = await setup(
      analysisThenSummary(['```javascript\nfunction testHypothesis(df) { throw new Error("boom"); }\n```'], ["unused"])
    );

    const events = await collect(orchestrator.testHypothesis(sessionId, "H", gateway));

    expect(events.map((event) => event.stage)).toEqual([
      "AnalysisPending",
      "AnalysisPending",
      "AnalysisComplete",
      "Executing",
      "Failed",
    ]);
    expect(events[events.length - 1]).toEqual({
      stage: "Failed",
      failed_stage: "Executing",
      error: { error: "EXECUTION_ERROR", status: 500, message: "Code execution error: Error: boom" },
    });
  });

  it("ends in Failed with the upstream status when the analysis call fails", async () => {
    const { orchestrator, sessionId, gateway } = await setup(() => ({
      status: 503,
      data: Readable.from(["unavailable"]),
    }));

    const events = await collect(orchestrator.testHypothesis(sessionId, "H", gateway));

    expect(events).toEqual([
      { stage: "AnalysisPending", analysis: "" },
      {
        stage: "Failed",
        failed_stage: "AnalysisPending",
        error: {
          error: "UPSTREAM_ERROR",
          status: 503,
          message: "Completion service returned 503",
          upstream: { status: 503, body: "unavailable" },
        },
      },
    ]);
  });

  it("rethrows cancellation instead of reporting Failed", async () => {
    const { orchestrator, sessionId, gateway } = await setup(analysisThenSummary(ANALYSIS_PIECES, ["ok"]));
    const controller = new AbortController();
    const events: string[] = [];

    const run = async () => {
      for await (const event of orchestrator.testHypothesis(sessionId, "H", gateway, { signal: controller.signal })) {
        events.push(event.stage);
        if (event.stage === "Executed") {
          controller.abort();
        }
      }
    };

    await expect(run()).rejects.toMatchObject({ code: "ERR_CANCELED" });
    expect(events.slice(-2)).toEqual(["Executed", "SummaryPending"]);
    expect(events).not.toContain("Failed");
  });
});

describe("StageMachine", () => {
  it("rejects illegal transitions", () => {
    const machine = new StageMachine();

    expect(() => machine.advance({ stage: "Executing" })).toThrow(
      new IllegalTransitionError("Start", "Executing")
    );
    machine.advance({ stage: "AnalysisPending", analysis: "" });
    expect(() => machine.advance({ stage: "Done", success: true, p_value: 0.1, analysis: "", summary: "" })).toThrow(
      "Illegal stage transition: AnalysisPending -> Done"
    );
  });

  it("accepts nothing after a terminal stage", () => {
    const machine = new StageMachine();
    const failed = machine.fail(new BadInputError("bad"));

    expect(failed).toEqual({
      stage: "Failed",
      failed_stage: "AnalysisPending",
      error: { error: "BAD_INPUT", status: 400, message: "bad" },
    });
    expect(machine.finished).toBe(true);
    expect(() => machine.advance({ stage: "AnalysisPending", analysis: "" })).toThrow(IllegalTransitionError);
  });
});

describe("AnalysisOrchestrator.generateHypotheses", () => {
  const json = JSON.stringify({ hypotheses: [{ hypothesis: "North sells more", benefit: "Stock planning" }] });

  it("streams partial text and completes with parsed hypotheses", async () => {
    const { orchestrator, sessionId, gateway, requests } = await setup(() => ({
      status: 200,
      data: sseStream([json.slice(0, 20), json.slice(20)]),
    }));

    const events = await collect(orchestrator.generateHypotheses(sessionId, gateway, { streaming: true }));

    expect(events).toEqual([
      { type: "partial", content: json.slice(0, 20) },
      { type: "partial", content: json },
      { type: "complete", result: [{ hypothesis: "North sells more", benefit: "Stock planning" }] },
    ]);
    expect(userPromptOf(requests[0])).toBe(SALES_DESCRIPTION);
    expect(requestBody(requests[0]).response_format).toBeDefined();
  });

  it("makes a single structured call without streaming", async () => {
    const { orchestrator, sessionId, gateway, requests } = await setup(() => ({
      status: 200,
      data: completionBody(json),
    }));

    const events = await collect(
      orchestrator.generateHypotheses(sessionId, gateway, { systemPrompt: "Find three ideas." })
    );

    expect(events).toEqual([
      { type: "complete", result: [{ hypothesis: "North sells more", benefit: "Stock planning" }] },
    ]);
    expect(systemPromptOf(requests[0])).toBe("Find three ideas.");
    expect(requestBody(requests[0]).stream).toBeUndefined();
  });

  it("raises when the streamed text is not valid hypotheses", async () => {
    const { orchestrator, sessionId, gateway } = await setup(() => ({
      status: 200,
      data: sseStream(['{"hypotheses": [']),
    }));

    const error = await collect(orchestrator.generateHypotheses(sessionId, gateway, { streaming: true })).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ status: 502 });
  });
});

describe("synthesis", () => {
  it("keeps only records with an outcome", () => {
    const content = synthesisContent([
      { title: "A", benefit: "b1", outcome: "Sales rise in spring" },
      { title: "B", benefit: "b2", outcome: "   " },
      { title: "C", benefit: "b3" },
      { title: "D", benefit: "b4", outcome: { success: false, p_value: 0.2 } },
      { title: "E", benefit: "b5", outcome: { success: true, p_value: 0.01, summary: "##### E holds" } },
    ]);

    expect(content).toBe(
      [
        "Hypothesis: A\nBenefit: b1\nResult: Sales rise in spring",
        "Hypothesis: D\nBenefit: b4\nResult: false. p-value: 0.200000",
        "Hypothesis: E\nBenefit: b5\nResult: ##### E holds",
      ].join("\n\n")
    );
  });

  it("streams the synthesis", async () => {
    const { orchestrator, gateway, requests } = await setup(() => ({ status: 200, data: sseStream(["##### Act", " now"]) }));

    const events = await collect(
      orchestrator.synthesize([{ title: "A", benefit: "b1", outcome: "yes" }], gateway, { streaming: true })
    );

    expect(events).toEqual([
      { type: "partial", content: "##### Act" },
      { type: "partial", content: "##### Act now" },
      { type: "complete", result: "##### Act now" },
    ]);
    expect(userPromptOf(requests[0])).toBe("Hypothesis: A\nBenefit: b1\nResult: yes");
  });

  it("rejects a list with no tested hypotheses", async () => {
    const { orchestrator, gateway, requests } = await setup(() => ({ status: 200, data: completionBody("unused") }));

    await expect(collect(orchestrator.synthesize([{ title: "A", benefit: "b1" }], gateway))).rejects.toThrow(
      new BadInputError("No tested hypotheses to synthesize")
    );
    expect(requests).toHaveLength(0);
  });
});
