import {readFile} from "node:fs/promises";

const CLOCK_PREFIX = "Timestamp:";

export type BoardSource =
  | {kind: "missing"}
  | {kind: "empty"}
  | {kind: "malformed"; lastLine: string}
  | {kind: "ready"; lines: string[]; clock: string};

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function splitLines(content: string): string[] {
  if (content === "") {
    return [];
  }
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * The last line of a board file must be `Timestamp: <token>`. Everything above
 * it is board content; the token is what tells one version from the next.
 */
export function parseBoardSource(content: string): BoardSource {
  const lines = splitLines(content);
  if (lines.length === 0) {
    return {kind: "empty"};
  }

  const lastLine = lines[lines.length - 1];
  if (!lastLine.startsWith(CLOCK_PREFIX)) {
    return {kind: "malformed", lastLine};
  }

  return {
    kind: "ready",
    lines: lines.slice(0, -1),
    clock: lastLine.slice(CLOCK_PREFIX.length).trim()
  };
}

export async function readBoardSource(path: string): Promise<BoardSource> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return {kind: "missing"};
    }
    throw error;
  }
  return parseBoardSource(content);
}
