import fs from "fs";
import { InputError } from "../errors.js";

export interface InputStream extends AsyncIterable<string | Buffer> {
  isTTY?: boolean;
}

/** Split text into trimmed lines; a final newline adds no empty line. */
export function toLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => line.trim());
}

async function readStream(stream: InputStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Collect input lines from the file (if any) followed by stdin.
 * stdin is read when it is piped, or when no file was given.
 */
export async function readInput(options: { file?: string }, stdin: InputStream): Promise<string[]> {
  const lines: string[] = [];

  if (options.file) {
    try {
      const content = await fs.promises.readFile(options.file, "utf-8");
      for (const line of toLines(content)) lines.push(line);
    } catch (error) {
      throw new InputError(`file '${options.file}'`, error);
    }
  }

  if (!stdin.isTTY || !options.file) {
    try {
      for (const line of toLines(await readStream(stdin))) lines.push(line);
    } catch (error) {
      throw new InputError("standard input", error);
    }
  }

  return lines;
}
