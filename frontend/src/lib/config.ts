import { z } from "zod";

const EnvSchema = z.object({
  VITE_WORKBOOK_URL: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined)),
});

const env = EnvSchema.parse(import.meta.env);

export const CONFIG = {
  sheets: { CHW: "CHW hourly", MTHW: "MTHW hourly" },
  timestampColumn: "Timestamp",
  unitSuffix: "(kbtuh)",
  threshold: { min: 0, max: 5000, step: 50, default: 700 },
  workbookUrl: env.VITE_WORKBOOK_URL,
} as const;
