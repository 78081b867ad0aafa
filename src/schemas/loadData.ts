import { z } from "zod";
import { SessionSummary } from "./common";

export const LoadDataInput = z.object({
  source: z.string().trim().min(1).describe("Local file path, or an http(s) URL of a CSV or SQLite file")
});

export type LoadDataInputT = z.infer<typeof LoadDataInput>;

export const LoadDataOutput = SessionSummary;

export type LoadDataOutputT = z.infer<typeof LoadDataOutput>;
