import * as fs from "node:fs";
import { ProfileError } from "../errors.js";

export const START_LINE = "# >>> wasmedge-env >>>";
export const END_LINE = "# <<< wasmedge-env <<<";
const DEFAULT_FILE_MODE = 0o644;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(file, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw new ProfileError(file, `Failed to read ${file}`, toError(err));
  }
}

async function writeLines(file: string, lines: string[]): Promise<void> {
  try {
    await fs.promises.writeFile(file, lines.join("\n") + "\n", {
      mode: DEFAULT_FILE_MODE,
    });
  } catch (err) {
    throw new ProfileError(file, `Failed to write ${file}`, toError(err));
  }
}

function sameLines(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}

/**
 * Split a file's lines around the managed block.
 * Returns null when the file has no block.
 */
function splitByFences(
  file: string,
  lines: string[],
): { before: string[]; managed: string[]; after: string[] } | null {
  const startIndex = lines.indexOf(START_LINE);
  const endIndex = lines.indexOf(END_LINE);

  if (startIndex < 0 && endIndex < 0) {
    return null;
  }
  if (startIndex < 0 || endIndex < 0) {
    throw new ProfileError(
      file,
      `Only one of the wasmedge-env marker lines is present in ${file}`,
      undefined,
      `Remove the remaining "${startIndex < 0 ? END_LINE : START_LINE}" line by hand`,
    );
  }
  if (startIndex > endIndex) {
    throw new ProfileError(
      file,
      `The wasmedge-env marker lines in ${file} are in the wrong order`,
      undefined,
      "Remove both marker lines by hand and run the command again",
    );
  }

  return {
    before: lines.slice(0, startIndex),
    managed: lines.slice(startIndex + 1, endIndex),
    after: lines.slice(endIndex + 1),
  };
}

/**
 * Insert or remove a fenced block of lines in a text file. Idempotent.
 *
 * @param file The file to edit. Created when the block must be present.
 * @param managedLines The lines inside the block, without the fences.
 * @param desiredPresent Whether the block should exist afterwards.
 * @returns Whether the file changed.
 */
export async function manageLinesInFile(
  file: string,
  managedLines: string[],
  desiredPresent: boolean,
): Promise<boolean> {
  const content = await readIfExists(file);

  if (content === null) {
    if (!desiredPresent) return false;
    await writeLines(file, [START_LINE, ...managedLines, END_LINE]);
    return true;
  }

  const lines = content.split("\n");
  // A trailing newline leaves an empty last element; drop it and add it back on write
  if (lines[lines.length - 1] === "") lines.pop();

  const parts = splitByFences(file, lines);

  if (desiredPresent) {
    if (parts === null) {
      const separator = lines.length > 0 && lines[lines.length - 1] !== "" ? [""] : [];
      await writeLines(file, [...lines, ...separator, START_LINE, ...managedLines, END_LINE]);
      return true;
    }
    if (sameLines(parts.managed, managedLines)) {
      return false;
    }
    await writeLines(file, [...parts.before, START_LINE, ...managedLines, END_LINE, ...parts.after]);
    return true;
  }

  if (parts === null) return false;

  const before = [...parts.before];
  // Drop the blank separator that was added along with the block
  if (parts.after.length === 0 && before[before.length - 1] === "") before.pop();
  const remaining = [...before, ...parts.after];

  if (remaining.every((line) => line.trim() === "")) {
    try {
      await fs.promises.rm(file);
    } catch (err) {
      throw new ProfileError(file, `Failed to remove ${file}`, toError(err));
    }
    return true;
  }

  await writeLines(file, remaining);
  return true;
}

/**
 * The lines currently inside the file's managed block, or null when the
 * file or the block does not exist.
 */
export async function readManagedLines(file: string): Promise<string[] | null> {
  const content = await readIfExists(file);
  if (content === null) return null;
  const parts = splitByFences(file, content.split("\n"));
  return parts ? parts.managed : null;
}

/**
 * Whether the file's managed block holds exactly the given lines.
 */
export async function managedLinesMatch(file: string, managedLines: string[]): Promise<boolean> {
  const current = await readManagedLines(file);
  return current !== null && sameLines(current, managedLines);
}
