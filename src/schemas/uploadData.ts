import { z } from "zod";
import { SessionSummary } from "./common";

export const UploadDataInput = z.object({
  filename: z.string().min(1).describe("Original file name; its extension selects the format"),
  content: z.string().min(1),
  encoding: z.enum(["utf8", "base64"]).default("utf8")
});

export type UploadDataInputT = z.infer<typeof UploadDataInput>;

export const UploadDataOutput = SessionSummary;

export type UploadDataOutputT = z.infer<typeof UploadDataOutput>;
