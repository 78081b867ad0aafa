import { z } from "zod";
import { SessionIdInput } from "./common";

export const DeleteSessionInput = z.object({
  session_id: SessionIdInput
});

export type DeleteSessionInputT = z.infer<typeof DeleteSessionInput>;

export const DeleteSessionOutput = z.object({
  message: z.string(),
  audit_id: z.string()
});

export type DeleteSessionOutputT = z.infer<typeof DeleteSessionOutput>;
