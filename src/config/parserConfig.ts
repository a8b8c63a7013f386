import { z } from "zod";
import { readJson } from "../utils/fs";

export const DEFAULT_METADATA_PREFIXES = [
  "ABS",
  "ABDC",
  "SJR",
  "SNIP",
  "CiteScore",
  "Impact Factor",
  "IF",
  "H-index",
  "Citations"
];

const yearSchema = z.number().int().min(1000).max(9999);

export const ParserConfigSchema = z
  .object({
    yearMin: yearSchema.default(2000),
    yearMax: yearSchema.default(2099),
    // Extracted titles must be at least 10 characters, so the threshold can only grow.
    minContentLength: z.number().int().min(10).default(10),
    metadataPrefixes: z.array(z.string().min(1)).min(1).default(DEFAULT_METADATA_PREFIXES),
    placeholderTokens: z.array(z.string().min(1)).default(["NA"])
  })
  .refine((config) => config.yearMin <= config.yearMax, {
    message: "yearMin must not exceed yearMax",
    path: ["yearMax"]
  });

export type ParserConfig = z.infer<typeof ParserConfigSchema>;

export const DEFAULT_PARSER_CONFIG: ParserConfig = ParserConfigSchema.parse({});

function checkParserConfig(data: unknown, label: string): ParserConfig {
  const parsed = ParserConfigSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
      .join("; ");
    throw new Error(`${label} is invalid: ${details}`);
  }
  return parsed.data;
}

/** Re-checks a config built in code; the shared default is already known to be valid. */
export function resolveParserConfig(config: ParserConfig): ParserConfig {
  if (config === DEFAULT_PARSER_CONFIG) return config;
  return checkParserConfig(config, "Parser config");
}

export async function loadParserConfig(configPath?: string): Promise<ParserConfig> {
  if (!configPath) return DEFAULT_PARSER_CONFIG;
  const data = await readJson<unknown>(configPath);
  return checkParserConfig(data, `Parser config ${configPath}`);
}
