import { z } from "zod";

const ConfigSchema = z.object({
  MODEL_DIR: z.string().default("./models"),
  /** When set, artifacts are read from this Supabase Storage bucket instead of MODEL_DIR. */
  MODEL_BUCKET: z.string().optional(),
  MODEL_PREFIX: z.string().default(""),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
  SUPABASE_ANON_KEY: z.string().optional(),
  USDA_API_KEY: z.string().default("DEMO_KEY"),
  NCI_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  PUBCHEM_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  USDA_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  DESCRIPTOR_SERVICE_URL: z.string().url().optional(),
  FALLBACK_OVERRIDE_PROBABILITY: z.coerce.number().min(0).max(1).default(0.3),
});

export type PredictorConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PredictorConfig {
  // Blank values from .env files count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => typeof v === "string" && v.trim() !== "")
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}
