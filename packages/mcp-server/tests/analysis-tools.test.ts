import { describe, it, expect, vi, afterEach } from "vitest";
import { z } from "zod";
import {
  AnalysisOrchestrator,
  AnalysisService,
  StaticTickerDirectory,
  silentLogger,
  type ImpactModel,
} from "@regimpact/engine";
import { createAnalysisHandlers } from "../src/tools/analysis.js";

const StartedSchema = z.object({ runId: z.string(), chunksTotal: z.number() });

const services: AnalysisService[] = [];

function setup(model: ImpactModel) {
  const orchestrator = new AnalysisOrchestrator({
    model,
    directory: new StaticTickerDirectory([{ symbol: "ACME", name: "Acme Corp", exchange: "NYSE" }]),
    logger: silentLogger,
    sleep: async () => {},
  });
  const service = new AnalysisService({
    orchestrator,
    summary: false,
    vocabulary: [{ term: "tariffs", category: "regulatory" }],
    logger: silentLogger,
  });
  services.push(service);
  return createAnalysisHandlers(service);
}

function payload(result: { content: { text: string }[] }): unknown {
  return JSON.parse(result.content[0].text);
}

const reply = (impact: string) => JSON.stringify({ severity: "medium", impact, key_terms: [] });

const hanging: ImpactModel = (_request, signal) =>
  new Promise<string>((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

afterEach(() => {
  for (const service of services.splice(0)) service.dispose();
});

describe("analysis tools", () => {
  it("runs an analysis from start to report", async () => {
    const handlers = setup(vi.fn<ImpactModel>().mockResolvedValue(reply("Acme faces tariffs.")));

    const started = await handlers.startAnalysis({ content: "New tariffs on imported steel.", ticker: "acme" });
    expect(started).not.toHaveProperty("isError");
    const { runId, chunksTotal } = StartedSchema.parse(payload(started));
    expect(chunksTotal).toBe(1);

    const report = await vi.waitFor(async () => {
      const result = await handlers.getReport({ run_id: runId });
      expect(result).not.toHaveProperty("isError");
      return payload(result);
    });

    expect(report).toMatchObject({
      runId,
      text: "Acme faces tariffs.",
      overallSeverity: "medium",
      highlightedText: "Acme faces **tariffs**.",
      target: { ticker: "ACME", name: "Acme Corp", exchange: "NYSE" },
    });
  });

  it("decodes base64 content and sniffs markup", async () => {
    const model = vi.fn<ImpactModel>().mockResolvedValue(reply("Minor."));
    const handlers = setup(model);
    const content = Buffer.from("<p>Quota <b>rules</b> apply.</p>").toString("base64");

    const started = await handlers.startAnalysis({ content, encoding: "base64", ticker: "ACME" });
    expect(started).not.toHaveProperty("isError");
    await vi.waitFor(() => expect(model).toHaveBeenCalledTimes(1));

    expect(model.mock.calls[0][0].prompt).toContain("Quota rules apply.");
  });

  it("reports a pending run and cancels it", async () => {
    const handlers = setup(hanging);
    const { runId } = StartedSchema.parse(payload(await handlers.startAnalysis({ content: "Text.", ticker: "ACME" })));

    const pending = await handlers.getReport({ run_id: runId });
    expect(pending.isError).toBe(true);
    expect(payload(pending)).toMatchObject({ code: "PENDING" });

    expect(payload(await handlers.cancelAnalysis({ run_id: runId }))).toEqual({ runId, cancelled: true });
    expect(payload(await handlers.getProgress({ run_id: runId }))).toMatchObject({ code: "RUN_CANCELLED" });
  });

  it("maps engine errors to error results", async () => {
    const handlers = setup(hanging);

    const badTicker = await handlers.startAnalysis({ content: "Text.", ticker: "ZZZZINVALID" });
    expect(badTicker.isError).toBe(true);
    expect(payload(badTicker)).toMatchObject({ code: "INVALID_TARGET" });

    const badFormat = await handlers.startAnalysis({ content: "Text.", format: "pdf", ticker: "ACME" });
    expect(payload(badFormat)).toEqual({
      error: "Unsupported document format \"pdf\". Accepted: HTML, XML or plain text",
      code: "UNSUPPORTED_FORMAT",
    });

    expect(payload(await handlers.getProgress({ run_id: "missing" }))).toMatchObject({ code: "UNKNOWN_RUN" });
  });

  it("rejects malformed tool input", async () => {
    const handlers = setup(hanging);
    const result = await handlers.startAnalysis({ content: "Text." });
    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({ error: "ticker: Required", code: "INVALID_INPUT" });
  });
});
