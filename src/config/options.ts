/**
 * CLI option validation
 * Commander's raw option bag goes in, one frozen AppConfig comes out
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { AppConfig, BorderStyle, HeaderSource, OutputFormat } from "../types/index.js";

const columnNumber = z.coerce.number().int().nonnegative();

export const cliOptionsSchema = z.object({
  file: z.string().optional(),
  header: z.string().optional(),
  separator: z.string().min(1, "separator must not be empty").default(" "),
  multiBlank: z.boolean().default(false),
  padding: columnNumber.default(1),
  colsep: z.string().default("│"),
  filter: z.string().optional(),
  sort: columnNumber.optional(),
  group: columnNumber.optional(),
  keepGroupValues: z.boolean().default(false),
  // commander sets these to false for --no-format, --no-numeric, --no-headline
  format: z.boolean().default(true),
  numeric: z.boolean().default(true),
  headline: z.boolean().default(true),
  removeHeader: z.boolean().default(false),
  titleSeparator: z.boolean().default(false),
  footerSeparator: z.boolean().default(false),
  columnSeparator: z.boolean().default(false),
  pretty: z.boolean().default(false),
  numbering: z.boolean().default(false),
  csv: z.boolean().default(false),
  json: z.boolean().default(false),
  yaml: z.boolean().default(false),
  html: z.boolean().default(false),
  titleColumn: z.boolean().default(false),
  verify: z.boolean().default(false),
});

export type CliOptions = z.input<typeof cliOptionsSchema>;
type ParsedOptions = z.output<typeof cliOptionsSchema>;

function borderStyle(options: ParsedOptions): BorderStyle {
  if (options.pretty) return "full";
  if (options.columnSeparator) return "columnSeparator";
  return "none";
}

function headerSource(options: ParsedOptions): HeaderSource {
  if (options.header !== undefined) return { kind: "explicit", text: options.header };
  if (!options.headline) return { kind: "none" };
  return { kind: "firstLine" };
}

function outputFormat(options: ParsedOptions): OutputFormat {
  if (options.csv) return "csv";
  if (options.json) return "json";
  if (options.yaml) return "yaml";
  if (options.html) return "html";
  return "table";
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildConfig(rawOptions: unknown, columns: readonly string[] = []): AppConfig {
  const result = cliOptionsSchema.safeParse(rawOptions);
  if (!result.success) {
    throw new ConfigError(result.error);
  }
  const options = result.data;
  const source = headerSource(options);

  const config: AppConfig = {
    input: options.file !== undefined ? { file: options.file } : {},
    tokenizer: { separator: options.separator, collapse: options.multiBlank },
    header: { removeFirstLine: options.removeHeader, source },
    columns: [...columns],
    render: {
      padding: options.padding,
      columnSeparator: options.colsep,
      border: borderStyle(options),
      // An explicit header always gets its rule
      titleSeparator: options.titleSeparator || source.kind === "explicit",
      footerSeparator: options.footerSeparator,
      numbering: options.numbering,
      format: options.format,
      numericAlign: options.numeric,
    },
    output: { format: outputFormat(options), titleColumn: options.titleColumn },
  };

  if (options.filter !== undefined) config.filter = options.filter;
  if (options.sort !== undefined) config.sort = { column: options.sort };
  if (options.group !== undefined) {
    config.group = { column: options.group, keepValues: options.keepGroupValues };
  }

  return deepFreeze(config);
}
