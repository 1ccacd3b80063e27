import { describe, test, expect } from "@jest/globals";
import { createUi, formatSummary } from "../src/cli/ui.js";
import type { Tally } from "../src/games/poker/tally.js";

function sink() {
  const chunks: string[] = [];
  return { chunks, write: (s: string) => { chunks.push(s); } };
}

const tally: Tally = { player1: 3, player2: 2, ties: 1, lines: 6, skipped: [] };

describe("summary output", () => {
  test("separate policy reports ties", () => {
    expect(formatSummary(tally, "separate")).toEqual(["Player 1: 3", "Player 2: 2", "Ties: 1"]);
  });

  test("folding policies leave the tie line out", () => {
    expect(formatSummary(tally, "player2")).toEqual(["Player 1: 3", "Player 2: 2"]);
  });

  test("skipped lines are counted", () => {
    const withSkips = { ...tally, skipped: [{ lineNumber: 4, reason: "bad" }] };
    expect(formatSummary(withSkips, "player1")).toEqual(["Player 1: 3", "Player 2: 2", "Skipped: 1"]);
  });

  test("non-tty output is uncolored, skip warnings go to stderr", () => {
    const out = sink();
    const err = sink();
    const ui = createUi(out, err, true);
    ui.summary({ ...tally, skipped: [{ lineNumber: 4, reason: "bad" }] }, "separate");
    expect(out.chunks.join("")).toBe("Player 1: 3\nPlayer 2: 2\nTies: 1\nSkipped: 1\n");
    expect(err.chunks).toEqual(["line 4 skipped: bad\n"]);
  });
});
