import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const EnvSchema = z.object({
  PANELS_DIR: z.string().min(1).default("panels"),
  PANEL_EXTENSION: z
    .string()
    .regex(/^\.[A-Za-z0-9]+$/, "must look like .txt")
    .default(".txt"),
  PANEL_STRICT_CASE: z.enum(["true", "false"]).default("false"),
  GIT_BIN: z.string().min(1).default("git"),
});

export type Config = {
  panelsDir: string;
  extension: string;
  strictCase: boolean;
  gitBin: string;
};

export function readConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  const { PANELS_DIR, PANEL_EXTENSION, PANEL_STRICT_CASE, GIT_BIN } = parsed.data;
  return {
    panelsDir: PANELS_DIR,
    extension: PANEL_EXTENSION,
    strictCase: PANEL_STRICT_CASE === "true",
    gitBin: GIT_BIN,
  };
}

/** Loads `.env` into the process environment, then reads it. */
export function loadConfig(): Config {
  dotenv.config();
  return readConfig(process.env);
}
