import { z } from "zod";

export const StartAnalysisSchema = z.object({
  content: z.string().min(1).describe("Document content: raw text, or base64 when encoding is \"base64\""),
  encoding: z.enum(["utf8", "base64"]).default("utf8").describe("How content is encoded"),
  format: z.string().optional().describe("Declared format: html, xml, markup, text or plain. Sniffed from content when omitted"),
  filename: z.string().optional().describe("Original file name; its extension is used when no format is declared"),
  ticker: z.string().min(1).describe("Listing symbol of the company to assess (e.g., AAPL)"),
});

export const RunIdSchema = z.object({
  run_id: z.string().min(1).describe("Run id returned by start_analysis"),
});

export type StartAnalysisInput = z.infer<typeof StartAnalysisSchema>;
