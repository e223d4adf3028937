import { z } from "zod/v4";
import { MAX_QUESTION_LENGTH } from "@/lib/constants";

export const sessionIdSchema = z.uuid();

export const investigateSchema = z.object({
  question: z.string().trim().min(1).max(MAX_QUESTION_LENGTH),
});

export type InvestigateInput = z.infer<typeof investigateSchema>;
