import { z } from "zod/v4";
import { ALLOWED_EXTENSIONS, MAX_FILE_SIZE } from "@/lib/constants";

export const uploadFileSchema = z.object({
  fileName: z.string().min(1),
  fileSize: z
    .number()
    .min(1, "File is empty.")
    .max(MAX_FILE_SIZE, "File too large. Maximum size is 10MB."),
});

export function validateFileExtension(fileName: string): boolean {
  const dot = fileName.lastIndexOf(".");
  if (dot < 0) return false;
  return ALLOWED_EXTENSIONS.includes(fileName.slice(dot).toLowerCase());
}

/** Safe form of a user-supplied file name for log lines. */
export function sanitizeFileName(fileName: string): string {
  return fileName
    .replace(/[^a-zA-Z0-9._-]/g, "_")
    .replace(/_{2,}/g, "_")
    .slice(0, 200);
}
