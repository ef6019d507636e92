import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import pc from "picocolors";
import { buildConfig } from "./config/options.js";
import { ColshapeError } from "./errors.js";
import { type InputStream, readInput } from "./input/reader.js";
import { formatOutput } from "./output/index.js";
import { processLines } from "./pipeline/index.js";
import { debug } from "./utils/debug.js";

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdin: InputStream;
  stdout: OutputStream;
  stderr: OutputStream;
}

// package.json sits one level above both src/ and dist/
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
    return String(packageJson.version);
  }
  return "0.0.0";
}

export class ColshapeCLI {
  private io: CliIO;

  constructor(io: CliIO) {
    this.io = io;
  }

  async run(options: Record<string, unknown>, columns: string[]): Promise<number> {
    try {
      const config = buildConfig(options, columns);

      if (options.verify === true) {
        this.io.stdout.write(`${JSON.stringify(config, null, 2)}\n`);
        return 0;
      }

      const lines = await readInput(config.input, this.io.stdin);
      const table = processLines(lines, config);
      this.io.stdout.write(formatOutput(table, config.output, config.render));
      return 0;
    } catch (error) {
      if (!(error instanceof ColshapeError)) {
        debug.error(error);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.io.stderr.write(`${pc.red(`Error: ${message}`)}\n`);
      return 1;
    }
  }
}

export function createProgram(cli: ColshapeCLI, io: CliIO, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name("colshape")
    .description("Shape unformatted text into aligned columns")
    .version(readVersion())
    .exitOverride()
    .configureOutput({
      writeOut: (str: string) => {
        io.stdout.write(str);
      },
      writeErr: (str: string) => {
        io.stderr.write(str);
      },
    })
    .allowUnknownOption(false)
    .argument("[columns...]", "output columns: N, START:END or END:START (1-based)")
    .option("-f, --file <path>", "read input from a file (stdin is added when piped)")
    .option("-H, --header <text>", "header line to use instead of the input's")
    .option("-s, --separator <sep>", "input field separator", " ")
    .option("-m, --multi-blank", "treat runs of whitespace as one separator")
    .option("-w, --padding <n>", "spaces on each side of a cell", "1")
    .option("-C, --colsep <sep>", "string drawn between columns with --column-separator", "│")
    .option("-F, --filter <regex>", "only process lines matching the pattern")
    .option("-S, --sort <n>", "sort by output column n")
    .option("-g, --group <n>", "group by output column n")
    .option("--keep-group-values", "keep repeated values in the grouped column")
    .option("--no-format", "do not pad columns to a common width")
    .option("--no-numeric", "do not right-align numeric values")
    .option("--no-headline", "the first line is data, not a header")
    .option("--remove-header", "discard the first line of input")
    .option("--title-separator", "draw a line under the header")
    .option("--footer-separator", "draw a line before the last row")
    .option("--column-separator", "draw the column separator between cells")
    .option("-p, --pretty", "draw a box around the table")
    .option("-n, --numbering", "add a row with the original column numbers")
    .option("--csv", "write CSV")
    .option("--json", "write JSON")
    .option("--yaml", "write YAML")
    .option("--html", "write an HTML table")
    .option("--title-column", "key JSON/YAML objects by the first column")
    .option("-v, --verify", "print the resolved configuration and exit")
    .action(async (columns: string[], options: Record<string, unknown>) => {
      onExit(await cli.run(options, columns));
    });

  return program;
}

/**
 * Parse `args` (without the node and script entries) and run.
 * Resolves to the process exit code.
 */
export async function main(args: string[], io: CliIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(new ColshapeCLI(io), io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (error: unknown) {
    // exitOverride turns help, version and usage errors into exceptions
    if (error instanceof CommanderError) {
      if (error.code === "commander.helpDisplayed" || error.code === "commander.version") {
        return 0;
      }
      return 1;
    }
    throw error;
  }

  return exitCode;
}
