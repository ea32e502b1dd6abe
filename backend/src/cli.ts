import { createInterface } from "readline";
import { BOARD_SIZE, generateMoves, parseBoardRows, parseColor, renderBoard, renderReport } from "@movescan/shared";
import type { Board, PlayerColor, ValidationResult } from "@movescan/shared";

const BOARD_PROMPT = "Please provide the current configuration of a chess board:";
const COLOR_PROMPT = "Who's turn is it? Type w or b for white or black:";

interface CliInput {
  board: Board;
  color: PlayerColor;
}

export const formatAnalysis = (board: Board, color: PlayerColor): string =>
  [
    "***** CURRENT BOARD *****",
    "",
    renderBoard(board),
    "",
    "***** AVAILABLE MOVES *****",
    "",
    renderReport(generateMoves(board, color))
  ].join("\n");

export const parseCliInput = (lines: readonly string[]): ValidationResult<CliInput> => {
  if (lines.length < BOARD_SIZE + 1) {
    return { ok: false, error: `Expected ${BOARD_SIZE} board lines and a color line, received ${lines.length} lines` };
  }
  const board = parseBoardRows(lines.slice(0, BOARD_SIZE).map((line) => line.split(",")));
  if (!board.ok) return board;
  const color = parseColor(lines[BOARD_SIZE]);
  if (!color.ok) return color;
  return { ok: true, value: { board: board.value, color: color.value } };
};

/** Reads eight board lines then a color line; resolves with the process exit code. */
export const runCli = async (
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  errorOutput: NodeJS.WritableStream
): Promise<number> => {
  const reader = createInterface({ input, crlfDelay: Infinity, terminal: false });
  const lines: string[] = [];

  output.write(`${BOARD_PROMPT}\n`);
  for await (const raw of reader) {
    const line = raw.trim();
    if (line.length === 0) continue;
    lines.push(line);
    if (lines.length === BOARD_SIZE) {
      output.write(`${COLOR_PROMPT}\n`);
    }
    if (lines.length > BOARD_SIZE) break;
  }

  const parsed = parseCliInput(lines);
  if (!parsed.ok) {
    errorOutput.write(`${parsed.error}\n`);
    return 1;
  }
  output.write(`\n${formatAnalysis(parsed.value.board, parsed.value.color)}\n`);
  return 0;
};
