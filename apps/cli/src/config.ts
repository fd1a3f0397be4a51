import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError, DEFAULT_RETRY_SETTINGS } from "@offsite/core-application";

export const CONFIG_FILE_NAMES = ["offsite.config.json", ".offsite.config.json"];

const PatternSchema = z.string().superRefine((pattern, ctx) => {
  try {
    new RegExp(pattern);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid regular expression: ${err instanceof Error ? err.message : String(err)}`,
    });
  }
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const OffsiteConfigSchema = z
  .object({
    stateDir: z.string().min(1).default("~/.offsite"),
    concurrency: z.number().int().positive().default(4),
    storeTimeoutMs: z.number().int().nonnegative().default(30000),
    retry: z
      .object({
        maxAttempts: z.number().int().positive().default(DEFAULT_RETRY_SETTINGS.maxAttempts),
        baseDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_SETTINGS.baseDelayMs),
        maxDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_SETTINGS.maxDelayMs),
        jitterRatio: z.number().min(0).max(1).default(DEFAULT_RETRY_SETTINGS.jitterRatio),
      })
      .strict()
      .default({}),
    includes: z.array(PatternSchema).default([]),
    excludes: z.array(PatternSchema).default([]),
    logLevel: LogLevelSchema.default("info"),
  })
  .strict();

export type OffsiteConfig = z.infer<typeof OffsiteConfigSchema>;

export type LoadedConfig = {
  config: OffsiteConfig;
  /** File the values came from, or null when only defaults and env apply. */
  source: string | null;
};

/**
 * Reads `offsite.config.json` from an explicit path or the nearest one found
 * walking up from `cwd`, then applies `OFFSITE_STATE_DIR` and
 * `OFFSITE_LOG_LEVEL`.
 */
export class ConfigLoader {
  constructor(
    private readonly options: { cwd: string; env: NodeJS.ProcessEnv; configPath?: string }
  ) {}

  findConfigFile(): string | null {
    let currentDir = path.resolve(this.options.cwd);

    for (;;) {
      for (const configName of CONFIG_FILE_NAMES) {
        const candidate = path.join(currentDir, configName);
        if (fs.existsSync(candidate)) return candidate;
      }
      const parent = path.dirname(currentDir);
      if (parent === currentDir) return null;
      currentDir = parent;
    }
  }

  load(): LoadedConfig {
    const explicit = this.options.configPath
      ? path.resolve(this.options.cwd, this.options.configPath)
      : null;
    const source = explicit ?? this.findConfigFile();

    let raw: unknown = {};
    if (source) {
      let text: string;
      try {
        text = fs.readFileSync(source, "utf-8");
      } catch (err) {
        throw new ConfigError(`Cannot read config file ${source}`, err);
      }
      try {
        raw = JSON.parse(text);
      } catch (err) {
        throw new ConfigError(`Invalid JSON in config file ${source}`, err);
      }
    }

    const parsed = OffsiteConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.errors
        .map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
        .join("; ");
      throw new ConfigError(`Invalid config${source ? ` at ${source}` : ""}: ${details}`, parsed.error);
    }

    return { config: this.applyEnv(parsed.data), source };
  }

  private applyEnv(config: OffsiteConfig): OffsiteConfig {
    const { env } = this.options;
    const next = { ...config };

    const stateDir = env["OFFSITE_STATE_DIR"];
    if (stateDir) next.stateDir = stateDir;

    const logLevel = env["OFFSITE_LOG_LEVEL"];
    if (logLevel) {
      const level = LogLevelSchema.safeParse(logLevel);
      if (!level.success) {
        throw new ConfigError(
          `OFFSITE_LOG_LEVEL must be one of ${LogLevelSchema.options.join(", ")}, got "${logLevel}"`
        );
      }
      next.logLevel = level.data;
    }

    return next;
  }
}
