import {readFile} from "node:fs/promises";

export const BOARD_DATA_MARKER = "<!--BOARD_DATA-->";
export const BOARD_ID_MARKER = "<!--BOARD_ID-->";
export const LAST_UPDATE_TIME_MARKER = "<!--LAST_UPDATE_TIME-->";

export interface DocumentFields {
  lines: string[];
  boardId: number;
  clock: string;
}

const MARKER_PATTERN = new RegExp([BOARD_DATA_MARKER, BOARD_ID_MARKER, LAST_UPDATE_TIME_MARKER].join("|"), "g");

/**
 * Single pass over the template: every marker is substituted and substituted
 * text is never scanned for markers again.
 */
export function renderDocument(template: string, fields: DocumentFields): string {
  const values: Record<string, string> = {
    [BOARD_DATA_MARKER]: JSON.stringify(fields.lines),
    [BOARD_ID_MARKER]: String(fields.boardId),
    [LAST_UPDATE_TIME_MARKER]: fields.clock
  };

  return template.replace(MARKER_PATTERN, (marker) => values[marker]);
}

export async function loadTemplate(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error: unknown) {
    throw new Error(`template-read-failed: ${path}`, {cause: error});
  }
}
