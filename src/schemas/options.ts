import { z } from "zod";

export const introspectOptionsSchema = z.object({
  readelf: z.string().min(1).default("readelf").describe("readelf command to run (name on PATH or absolute path)"),
  timeout: z.number().int().positive().optional().describe("Timeout per readelf run in seconds (default: none)"),
});
export type IntrospectOptions = z.input<typeof introspectOptionsSchema>;
