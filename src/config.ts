import { z } from "zod";
import dotenv from "dotenv";
import { ConfigError } from "./errors.js";
import { resolveMeasurementLocale } from "./locale.js";

dotenv.config();

// Case-insensitive; anything unrecognized (or unset) logs at warn rather than failing the run.
export const LogLevelSchema = z
  .preprocess(
    (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
  )
  .catch("warn");

export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  LC_ALL: z.string().optional(),
  LC_MEASUREMENT: z.string().optional(),
  LANG: z.string().optional(),

  // GNU getopt semantics: set to anything to stop option parsing at the first positional.
  POSIXLY_CORRECT: z
    .string()
    .optional()
    .transform((v) => v !== undefined),

  LOG_LEVEL: LogLevelSchema,

  DEWPOINT_HELP_TEMPLATE_PATH: z.string().min(1).optional()
});

export type AppConfig = Omit<z.infer<typeof EnvSchema>, "LC_ALL" | "LC_MEASUREMENT" | "LANG"> & {
  MEASUREMENT_LOCALE: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new ConfigError(`invalid environment configuration (${fields})`, { cause: parsed.error });
  }
  const { LC_ALL, LC_MEASUREMENT, LANG, ...rest } = parsed.data;
  return { ...rest, MEASUREMENT_LOCALE: resolveMeasurementLocale({ LC_ALL, LC_MEASUREMENT, LANG }) };
}
