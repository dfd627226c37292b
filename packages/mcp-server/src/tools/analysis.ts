import { Buffer } from "node:buffer";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  applyHighlights,
  createDocument,
  resolveFormat,
  type AnalysisService,
} from "@regimpact/engine";
import { RunIdSchema, StartAnalysisSchema, type StartAnalysisInput } from "../schemas/analysis.js";
import { errorResponse, wrapResponse, type ToolResult } from "../formatters/response.js";

function decodeContent({ content, encoding }: StartAnalysisInput): Uint8Array {
  return encoding === "base64" ? Buffer.from(content, "base64") : new TextEncoder().encode(content);
}

async function respond(fn: () => unknown): Promise<ToolResult> {
  try {
    return wrapResponse(await fn());
  } catch (err) {
    return errorResponse(err);
  }
}

export function createAnalysisHandlers(service: AnalysisService) {
  return {
    startAnalysis: (params: unknown) => respond(async () => {
      const input = StartAnalysisSchema.parse(params);
      const bytes = decodeContent(input);
      const format = resolveFormat({ format: input.format, filename: input.filename, bytes });
      const runId = await service.startAnalysis(createDocument(bytes, format), input.ticker);
      const { status, chunksTotal } = service.getProgress(runId);
      return { runId, status, chunksTotal };
    }),

    getProgress: (params: unknown) => respond(() => {
      const { run_id } = RunIdSchema.parse(params);
      return service.getProgress(run_id);
    }),

    getReport: (params: unknown) => respond(() => {
      const { run_id } = RunIdSchema.parse(params);
      const report = service.getReport(run_id);
      return { ...report, highlightedText: applyHighlights(report.text, report.highlights) };
    }),

    cancelAnalysis: (params: unknown) => respond(() => {
      const { run_id } = RunIdSchema.parse(params);
      return { runId: run_id, cancelled: service.cancel(run_id) };
    }),
  };
}

export function registerAnalysisTools(server: McpServer, service: AnalysisService) {
  const handlers = createAnalysisHandlers(service);

  server.tool(
    "start_analysis",
    "Start a regulatory impact analysis of a document (HTML, XML or plain text) for one listed company. Validates the document and ticker, splits the text into segments and begins assessing them in the background. Returns a run id to poll with get_progress and get_report.",
    StartAnalysisSchema.shape,
    async (params) => handlers.startAnalysis(params),
  );

  server.tool(
    "get_progress",
    "Get progress for an analysis run: status, segments completed out of total, average seconds per segment and an estimate of the time remaining.",
    RunIdSchema.shape,
    async (params) => handlers.getProgress(params),
  );

  server.tool(
    "get_report",
    "Get the finished impact report for a run: combined narrative in document order, overall severity, per-segment results, highlighted regulatory terms and, when enabled, a consolidated summary. Fails with code PENDING while segments are still being assessed. Retrieving the report releases the run.",
    RunIdSchema.shape,
    async (params) => handlers.getReport(params),
  );

  server.tool(
    "cancel_analysis",
    "Cancel a running analysis. In-flight segment assessments are abandoned and later lookups report the run as cancelled.",
    RunIdSchema.shape,
    async (params) => handlers.cancelAnalysis(params),
  );
}
