import { describe, expect, it } from "vitest";

import { ActionHistoryManager, applyAction, type HistoryAction } from "../src/history";
import { createBoard, createCard, type Board } from "../src/model";
import { encodeBoards } from "../src/persistence";

function fixture(): Board[] {
  const a = createBoard({ name: "A", cards: [createCard({ name: "a1" }), createCard({ name: "a2" })] });
  const b = createBoard({ name: "B", cards: [createCard({ name: "b1" })] });
  return [a, b];
}

function at<T>(items: T[], index: number): T {
  const item = items[index];
  if (item === undefined) throw new Error(`missing item ${index}`);
  return item;
}

describe("ActionHistoryManager", () => {
  it("undoes a sequence of actions back to the starting state and redoes each one", () => {
    const boards = fixture();
    const history = new ActionHistoryManager();
    const [a, b] = [at(boards, 0), at(boards, 1)];
    const a1 = at(a.cards, 0);
    const b1 = at(b.cards, 0);
    const c = createBoard({ name: "C" });
    const c1 = createCard({ name: "c1" });

    const actions: HistoryAction[] = [
      { type: "CreateBoard", board: c },
      { type: "CreateCard", card: c1, boardId: c.id },
      { type: "MoveCardWithinBoard", boardId: a.id, from: 0, to: 1 },
      { type: "MoveCardBetweenBoards", card: a1, sourceBoardId: a.id, targetBoardId: b.id, sourceIndex: 1, targetIndex: 0 },
      { type: "EditCard", oldCard: b1, newCard: { ...b1, name: "b1 edited" }, boardId: b.id },
      { type: "DeleteCard", card: c1, boardId: c.id, index: 0 },
      { type: "DeleteBoard", board: a, index: 0 },
    ];

    const states = [encodeBoards(boards)];
    for (const action of actions) {
      applyAction(boards, action);
      history.record(action);
      states.push(encodeBoards(boards));
    }
    expect(boards.map((x) => x.name)).toEqual(["B", "C"]);
    expect(at(boards, 0).cards.map((x) => x.name)).toEqual(["a1", "b1 edited"]);

    for (let i = actions.length; i > 0; i--) {
      expect(history.undo(boards).ok).toBe(true);
      expect(encodeBoards(boards)).toBe(states[i - 1]);
      expect(history.redo(boards).ok).toBe(true);
      expect(encodeBoards(boards)).toBe(states[i]);
      history.undo(boards);
    }
    expect(encodeBoards(boards)).toBe(states[0]);
    expect(history.undo(boards)).toEqual({ ok: false, message: "No more actions to undo" });
  });

  it("describes what it undid", () => {
    const boards = fixture();
    const history = new ActionHistoryManager();
    const b = at(boards, 1);
    const b1 = at(b.cards, 0);
    const edited = { ...b1, name: "renamed" };
    applyAction(boards, { type: "EditCard", oldCard: b1, newCard: edited, boardId: b.id });
    history.record({ type: "EditCard", oldCard: b1, newCard: edited, boardId: b.id });
    expect(history.undo(boards)).toEqual({ ok: true, message: "Undo Edit Card 'b1'" });
    expect(history.redo(boards)).toEqual({ ok: true, message: "Redo Edit Card 'b1'" });
    expect(history.redo(boards)).toEqual({ ok: false, message: "No more actions to redo" });
  });

  it("drops the redo branch on a new action", () => {
    const boards = fixture();
    const history = new ActionHistoryManager();
    const first = createBoard({ name: "X" });
    applyAction(boards, { type: "CreateBoard", board: first });
    history.record({ type: "CreateBoard", board: first });
    history.undo(boards);
    expect(history.canRedo()).toBe(true);
    const second = createBoard({ name: "Y" });
    applyAction(boards, { type: "CreateBoard", board: second });
    history.record({ type: "CreateBoard", board: second });
    expect(history.canRedo()).toBe(false);
    expect(history.size).toBe(1);
  });

  it("keeps at most the configured number of entries", () => {
    const history = new ActionHistoryManager(2);
    for (const name of ["x", "y", "z"]) history.record({ type: "CreateBoard", board: createBoard({ name }) });
    expect(history.size).toBe(2);
    expect(history.position).toBe(2);
  });

  it("reports an action that no longer applies instead of throwing", () => {
    const boards = fixture();
    const history = new ActionHistoryManager();
    const ghost = createBoard({ name: "Ghost" });
    history.record({ type: "CreateBoard", board: ghost });
    expect(history.undo(boards)).toEqual({ ok: false, message: "Could not undo Create Board 'Ghost': board not found" });
    expect(history.position).toBe(1);
  });
});
