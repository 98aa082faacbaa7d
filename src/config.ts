import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  TERMFORM_LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  TERMFORM_LOG_FILE: z.string().min(1).optional(),
  TERMFORM_LOG_TO_CONSOLE: booleanFlag.default("false"),
  TERMFORM_FORMS_DIR: z.string().min(1).default("forms"),
  TERM: z.string().optional(),
});

export type LogLevel = "error" | "warn" | "info" | "debug";

export type TermformConfig = {
  logLevel: LogLevel;
  logFile?: string;
  logToConsole: boolean;
  formsDir: string;
  /** Value of TERM, consulted for ANSI support on Windows consoles. */
  term?: string;
  platform: NodeJS.Platform;
};

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  platform: NodeJS.Platform = process.platform,
): TermformConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid termform environment: ${details.join("; ")}`);
  }
  const vars = parsed.data;
  return {
    logLevel: vars.TERMFORM_LOG_LEVEL,
    logFile: vars.TERMFORM_LOG_FILE,
    logToConsole: vars.TERMFORM_LOG_TO_CONSOLE,
    formsDir: vars.TERMFORM_FORMS_DIR,
    term: vars.TERM,
    platform,
  };
}
