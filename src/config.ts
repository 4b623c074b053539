import { readFile } from "fs/promises";
import { resolve } from "path";
import { z } from "zod";
import { FORMAT_PRESETS, type Format } from "./format/format.js";

/**
 * Configuration file types
 *
 * The JSON file may leave out anything; missing values come from
 * DEFAULT_CONFIG. Format options override the chosen preset one by one.
 */

const FormatConfigSchema = z
  .object({
    preset: z.enum(["default", "precise", "r"]),
    trueRep: z.string(),
    falseRep: z.string(),
    intFmt: z.string(),
    floatFmt: z.string(),
    stringFmt: z.string(),
    timeFmt: z.string(),
    timeZone: z.string(),
    durationFmt: z.string(),
    naRep: z.string(),
    nanRep: z.string(),
    posInfRep: z.string(),
    negInfRep: z.string(),
  })
  .partial();

const OutputConfigSchema = z
  .object({
    kind: z.enum(["csv", "tab", "r", "sqlite"]),
    omitHeader: z.boolean(),
    delimiter: z.string().length(1),
    dataFrame: z.string(),
    database: z.string(),
    table: z.string().min(1),
  })
  .partial();

const ConfigFileSchema = z
  .object({
    format: FormatConfigSchema,
    output: OutputConfigSchema,
    verbose: z.boolean(),
  })
  .partial();

export type FormatConfig = z.infer<typeof FormatConfigSchema>;
export type OutputKind = NonNullable<z.infer<typeof OutputConfigSchema>["kind"]>;

export interface OutputConfig {
  kind: OutputKind;
  omitHeader: boolean;
  delimiter: string;
  dataFrame: string;
  /** SQLite database file for the "sqlite" output; must be set to use it */
  database: string;
  table: string;
}

export interface Config {
  format: FormatConfig;
  output: OutputConfig;
  verbose: boolean;
}

export const DEFAULT_CONFIG: Config = {
  format: {
    preset: "default",
  },
  output: {
    kind: "tab",
    omitHeader: false,
    delimiter: ",",
    dataFrame: "",
    database: "",
    table: "records",
  },
  verbose: false,
};

export const CONFIG_FILE = "recdump.config.json";

export async function loadConfig(configPath?: string): Promise<Config> {
  const path = configPath || resolve(process.cwd(), CONFIG_FILE);

  try {
    const content = await readFile(path, "utf-8");
    const parsed = ConfigFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new Error(`Invalid config ${path}: ${issues.join("; ")}`);
    }
    const userConfig = parsed.data;

    // Merge with defaults
    return {
      format: { ...DEFAULT_CONFIG.format, ...userConfig.format },
      output: { ...DEFAULT_CONFIG.output, ...userConfig.output },
      verbose: userConfig.verbose ?? DEFAULT_CONFIG.verbose,
    };
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      // Config file not found, use defaults
      return DEFAULT_CONFIG;
    }
    throw error;
  }
}

/**
 * Build the formatter described by a format config
 */
export function resolveFormat(config: FormatConfig): Format {
  const { preset = "default", ...overrides } = config;
  return FORMAT_PRESETS[preset].with(overrides);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
