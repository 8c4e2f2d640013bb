import { z } from "zod";

/** Keys are matched exactly as given; only all-blank values are refused. */
export const nonBlankString = z.string().refine((s) => s.trim().length > 0, "must not be blank");
