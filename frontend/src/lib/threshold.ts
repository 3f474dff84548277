import { z } from "zod";
import { CONFIG } from "@/lib/config";

const { min, max } = CONFIG.threshold;

export const ThresholdSchema = z
  .string()
  .trim()
  .min(1, "Enter a threshold in kBTU/h.")
  .pipe(
    z.coerce
      .number({ invalid_type_error: "Threshold must be a number." })
      .int("Threshold must be a whole number.")
      .min(min, `Threshold must be at least ${min} kBTU/h.`)
      .max(max, `Threshold must be at most ${max} kBTU/h.`),
  );

export type ThresholdResult = { ok: true; value: number } | { ok: false; error: string };

export function parseThreshold(raw: string): ThresholdResult {
  const parsed = ThresholdSchema.safeParse(raw);
  if (parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, error: parsed.error.issues[0]?.message ?? "Invalid threshold." };
}
