import { describe, expect, it } from "vitest";

import { createBoard, createCard, type Board } from "../src/model";
import {
  buildProjection,
  navigate,
  projectionHolds,
  reconcileProjection,
  type Direction,
  type ProjectionState,
  type WindowSize,
} from "../src/projection";

function board(name: string, cards: string[]): Board {
  const b = createBoard({ name, cards: cards.map((c) => createCard({ name: c })) });
  b.id = name;
  b.cards.forEach((c) => {
    c.id = c.name;
  });
  return b;
}

function ids(state: ProjectionState): Record<string, string[]> {
  return Object.fromEntries(state.projection);
}

const size: WindowSize = { boardsShown: 2, cardsShown: 2 };

describe("buildProjection", () => {
  it("shows the first boards and cards and selects the first card", () => {
    const boards = [board("A", ["a1", "a2", "a3"]), board("B", ["b1"]), board("C", [])];
    const state = buildProjection(boards, size);
    expect(ids(state)).toEqual({ A: ["a1", "a2"], B: ["b1"] });
    expect(state.selection).toEqual({ boardId: "A", cardId: "a1" });
  });

  it("selects nothing without boards", () => {
    expect(buildProjection([], size)).toEqual({ projection: new Map(), selection: {} });
  });
});

describe("navigate", () => {
  const boards = [board("A", ["a1", "a2", "a3"]), board("B", ["b1"]), board("C", []), board("D", ["d1"])];

  it("scrolls the card window when moving past its edge", () => {
    let state = buildProjection(boards, size);
    for (const expected of ["a2", "a3"]) {
      const result = navigate({ boards, state, size, direction: "Down" });
      if (!result.ok) throw result.error;
      state = result;
      expect(state.selection.cardId).toBe(expected);
    }
    expect(ids(state).A).toEqual(["a2", "a3"]);
  });

  it("reports boundaries without changing the selection", () => {
    const state = buildProjection(boards, size);
    const up = navigate({ boards, state, size, direction: "Up" });
    expect(up.ok).toBe(false);
    if (up.ok) return;
    expect(up.error.kind).toBe("AlreadyAtFirstCard");
    expect(up.error.message).toBe("Cannot go Up: Already at first card");
    const left = navigate({ boards, state, size, direction: "Left" });
    expect(!left.ok && left.error.message).toBe("Cannot go Left: Already at first board");
  });

  it("reveals the next board when moving right past the window", () => {
    let state = buildProjection(boards, size);
    for (const direction of ["Right", "Right"] satisfies Direction[]) {
      const result = navigate({ boards, state, size, direction });
      if (!result.ok) throw result.error;
      state = result;
    }
    expect([...state.projection.keys()]).toEqual(["B", "C"]);
    expect(state.selection).toEqual({ boardId: "C", cardId: undefined });
    const down = navigate({ boards, state, size, direction: "Down" });
    expect(!down.ok && down.error.kind).toBe("CurrentBoardHasNoCards");
  });

  it("fails on an empty board set", () => {
    const result = navigate({ boards: [], state: buildProjection([], size), size, direction: "Right" });
    expect(!result.ok && result.error.message).toBe("Cannot go Right: No boards found");
  });

  it("always leaves a valid selection or reports a boundary", () => {
    const shapes = [
      [board("A", ["a1", "a2", "a3", "a4", "a5"]), board("B", []), board("C", ["c1", "c2"])],
      [board("A", []), board("B", ["b1"])],
      [board("A", ["a1"]), board("B", ["b1", "b2", "b3"]), board("C", ["c1"]), board("D", [])],
    ];
    const directions: Direction[] = ["Up", "Down", "Left", "Right"];
    const boundaries = new Set([
      "AlreadyAtFirstBoard",
      "AlreadyAtLastBoard",
      "AlreadyAtFirstCard",
      "AlreadyAtLastCard",
      "CurrentBoardHasNoCards",
    ]);
    let seed = 7;
    const nextDirection = (): Direction => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return directions[seed % 4] ?? "Up";
    };
    for (const shape of shapes) {
      let state = buildProjection(shape, size);
      for (let step = 0; step < 200; step++) {
        const result = navigate({ boards: shape, state, size, direction: nextDirection() });
        if (result.ok) {
          state = result;
          expect(projectionHolds(state, shape, size)).toBe(true);
        } else {
          expect(boundaries.has(result.error.kind)).toBe(true);
        }
      }
    }
  });
});

describe("reconcileProjection", () => {
  it("slides the window to keep the selection visible", () => {
    const boards = [board("A", ["a1", "a2", "a3", "a4", "a5"])];
    const state = reconcileProjection({
      boards,
      previous: new Map([["A", ["a1", "a2"]]]),
      selection: { boardId: "A", cardId: "a5" },
      size,
    });
    expect(ids(state)).toEqual({ A: ["a4", "a5"] });
    expect(state.selection).toEqual({ boardId: "A", cardId: "a5" });
  });

  it("drops stale ids and falls back to the first visible card", () => {
    const boards = [board("A", ["a1", "a3"])];
    const state = reconcileProjection({
      boards,
      previous: new Map([["A", ["a1", "a2"]]]),
      selection: { boardId: "A", cardId: "a2" },
      size,
    });
    expect(ids(state)).toEqual({ A: ["a1", "a3"] });
    expect(state.selection).toEqual({ boardId: "A", cardId: "a1" });
    expect(projectionHolds(state, boards, size)).toBe(true);
  });
});
