import type { ZodError } from "zod";

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function formatZodIssues(error: ZodError, separator = "; "): string {
  return error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join(separator);
}
