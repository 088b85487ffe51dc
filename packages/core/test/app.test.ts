import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { App } from "../src/app";
import { changeCardPriority, redo, undo } from "../src/card-actions";
import { DATE_TIME_FORMATS } from "../src/dates";
import { chooseDateFormat } from "../src/forms";
import { createBoard, createCard, type Board } from "../src/model";
import { encodeBoards, listSaveFiles } from "../src/persistence";
import { harness, press, tempDir, toastMessages, type } from "./helpers";

function at<T>(items: T[], index: number): T {
  const item = items[index];
  if (item === undefined) throw new Error(`missing item ${index}`);
  return item;
}

function onBoards(app: App, boards: Board[]): void {
  app.setBoards(boards);
  app.setView(app.config.defaultView);
}

describe("App", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates a board and a card from the keyboard, saves, and loads them on the next start", async () => {
    const { app, io } = harness({ dir });
    app.setView(app.config.defaultView);
    expect(app.focus).toBe("Body");

    press(app, "b", "enter");
    expect(app.view).toBe("NewBoard");
    expect(app.status).toBe("UserInput");
    type(app, "Todo");
    press(app, "enter", "enter", "enter");
    expect(app.view).toBe("TitleBodyHelpLog");
    expect(app.boards.map((b) => b.name)).toEqual(["Todo"]);
    expect(toastMessages(app)).toContain("Created new board 'Todo'");

    press(app, "n", "enter");
    expect(app.view).toBe("NewCard");
    type(app, "Write notes");
    press(app, "enter");
    type(app, "first draft");
    press(app, "enter");
    type(app, "15-03-2030");
    press(app, "enter", "enter");

    const card = at(at(app.boards, 0).cards, 0);
    expect(card).toMatchObject({ name: "Write notes", description: "first draft", dueDate: "15/03/2030" });
    expect(app.visible.selection).toEqual({ boardId: at(app.boards, 0).id, cardId: card.id });

    press(app, "ctrl-s");
    await io.flush();
    expect(toastMessages(app)).toContain("👍 Local data saved");
    const saves = await listSaveFiles(path.join(dir, "saves"));
    expect(saves).toHaveLength(1);

    const next = harness({ dir });
    next.app.dispatch({ type: "Initialize" });
    await next.io.flush();
    expect(next.app.view).toBe("TitleBodyHelpLog");
    expect(next.app.boards.map((b) => b.name)).toEqual(["Todo"]);
    expect(at(at(next.app.boards, 0).cards, 0)).toMatchObject({
      id: card.id,
      name: "Write notes",
      description: "first draft",
      dueDate: "15/03/2030",
    });
    expect(toastMessages(next.app)).toContain(`👍 Local data loaded from "${at(saves, 0).fileName}"`);
    expect(next.app.loading).toBe(false);
  });

  it("moves a card to the next board and restores the exact boards on undo", () => {
    const { app } = harness({ dir });
    const c1 = createCard({ name: "c1" });
    const boards = [
      createBoard({ name: "A", cards: [c1, createCard({ name: "c2" })] }),
      createBoard({ name: "B", cards: [createCard({ name: "b1" })] }),
    ];
    onBoards(app, boards);
    app.select(at(boards, 0).id, c1.id);
    const before = encodeBoards(app.boards);

    press(app, "shift-right");
    expect(at(app.boards, 0).cards.map((c) => c.name)).toEqual(["c2"]);
    expect(at(app.boards, 1).cards.map((c) => c.name)).toEqual(["c1", "b1"]);
    expect(app.visible.selection).toEqual({ boardId: at(boards, 1).id, cardId: c1.id });

    press(app, "ctrl-z");
    expect(encodeBoards(app.boards)).toBe(before);
    press(app, "ctrl-y");
    expect(at(app.boards, 1).cards.map((c) => c.name)).toEqual(["c1", "b1"]);
  });

  it("refuses to move past the last board", () => {
    const { app } = harness({ dir });
    const only = createCard({ name: "only" });
    const board = createBoard({ name: "A", cards: [only] });
    onBoards(app, [board]);
    app.select(board.id, only.id);

    press(app, "shift-right");
    expect(toastMessages(app)).toContain("Cannot move card right: already in the last board");
    expect(app.history.size).toBe(0);
  });

  it("rewrites due dates on a format change, undo history included", () => {
    let clock = Date.parse("2030-01-01T00:00:00.000Z");
    const { app } = harness({ dir, config: { dateTimeFormat: "DayMonthYear" }, now: () => clock });
    const card = createCard({ name: "x", dueDate: "05/03/2030", now: new Date("2029-12-31T00:00:00.000Z") });
    const board = createBoard({ name: "A", cards: [card] });
    onBoards(app, [board]);
    app.select(board.id, card.id);
    changeCardPriority(app, "High");

    clock = Date.parse("2030-01-02T00:00:00.000Z");
    app.lists.dateFormat = DATE_TIME_FORMATS.indexOf("MonthDayYear");
    app.setPopup("ChangeDateFormat");
    chooseDateFormat(app);
    expect(app.config.dateTimeFormat).toBe("MonthDayYear");
    expect(card.dueDate).toBe("03/05/2030");
    expect(card.modifiedAt).toBe("2030-01-02T00:00:00.000Z");

    undo(app);
    expect(at(board.cards, 0)).toMatchObject({ priority: "Low", dueDate: "03/05/2030" });
    redo(app);
    expect(at(board.cards, 0)).toMatchObject({ priority: "High", dueDate: "03/05/2030" });
  });

  it("filters by tag and restores the full board set when the filter is cleared", () => {
    const { app } = harness({ dir });
    const boards = [
      createBoard({
        name: "A",
        cards: [
          createCard({ name: "c1", tags: ["urgent"] }),
          createCard({ name: "c2" }),
          createCard({ name: "c3", tags: ["URGENT", "later"] }),
        ],
      }),
      createBoard({ name: "B", cards: [createCard({ name: "b1", tags: ["later"] })] }),
    ];
    onBoards(app, boards);

    expect(app.applyTagFilter(["urgent"])).toBe(true);
    expect(app.currentBoards().map((b) => b.name)).toEqual(["A"]);
    expect(at(app.currentBoards(), 0).cards.map((c) => c.name)).toEqual(["c1", "c3"]);
    expect(toastMessages(app)).toContain("Filtered by tags: urgent");

    press(app, "shift-right");
    expect(toastMessages(app)).toContain("Cannot move cards while a filter is active, clear the filter first");

    app.clearFilter();
    expect(app.currentBoards().map((b) => b.name)).toEqual(["A", "B"]);
    expect(at(app.boards, 0).cards).toHaveLength(3);
  });

  it("warns instead of filtering when no card carries the tags", () => {
    const { app } = harness({ dir });
    onBoards(app, [createBoard({ name: "A", cards: [createCard({ name: "c1" })] })]);

    expect(app.applyTagFilter([])).toBe(false);
    expect(app.applyTagFilter(["missing"])).toBe(false);
    expect(toastMessages(app)).toEqual(["No tags selected", "No cards found with the selected tags"]);
    expect(app.isFiltered()).toBe(false);
  });

  describe("card view", () => {
    function openCard() {
      const h = harness({ dir });
      const card = createCard({ name: "x" });
      const board = createBoard({ name: "A", cards: [card] });
      onBoards(h.app, [board]);
      h.app.select(board.id, card.id);
      press(h.app, "enter");
      expect(h.app.popup).toBe("ViewCard");
      expect(h.app.focus).toBe("CardName");
      press(h.app, "enter");
      expect(h.app.status).toBe("UserInput");
      type(h.app, "yz");
      press(h.app, "esc");
      return { ...h, board };
    }

    it("asks before dropping pending edits and can save them", () => {
      const { app, board } = openCard();
      expect(app.popup).toBe("ConfirmDiscardCardChanges");
      expect(app.focus).toBe("SubmitButton");

      press(app, "enter");
      expect(app.popup).toBeUndefined();
      expect(at(board.cards, 0).name).toBe("xyz");
      expect(app.history.size).toBe(1);
      expect(toastMessages(app)).toContain("Changes to Card 'xyz' saved");
    });

    it("discards pending edits from the confirmation", () => {
      const { app, board } = openCard();
      press(app, "tab");
      expect(app.focus).toBe("ExtraFocus");

      press(app, "enter");
      expect(app.popup).toBeUndefined();
      expect(at(board.cards, 0).name).toBe("x");
      expect(app.history.size).toBe(0);
      expect(toastMessages(app)).toContain("Discarding changes to card 'x'");
    });

    it("closes without asking when nothing changed", () => {
      const h = harness({ dir });
      const card = createCard({ name: "x" });
      const board = createBoard({ name: "A", cards: [card] });
      onBoards(h.app, [board]);
      h.app.select(board.id, card.id);

      press(h.app, "enter", "esc");
      expect(h.app.popup).toBeUndefined();
      expect(h.app.view).toBe("TitleBodyHelpLog");
    });
  });

  it("keeps the parent of a nested popup when the card view cannot open", () => {
    const { app } = harness({ dir });
    const card = createCard({ name: "x" });
    const board = createBoard({ name: "A", cards: [card] });
    onBoards(app, [board]);
    app.select(board.id, card.id);
    app.setPopup("ViewCard");
    app.setPopup("CardStatusSelector");
    expect(app.isNestedPopup()).toBe(true);

    board.cards.splice(0);
    app.setPopup("ViewCard");
    expect(toastMessages(app)).toEqual(["No card selected"]);
    expect(app.popup).toBe("CardStatusSelector");
    expect(app.isNestedPopup()).toBe(true);
    app.closePopup();
    expect(app.popup).toBe("ViewCard");
  });

  it("quits from the main menu on esc and queues a save when save on exit is set", () => {
    const { app } = harness({ dir });
    press(app, "esc");
    expect(app.shouldQuit).toBe(true);
    expect(app.io.drain()).toEqual([{ type: "AutoSave" }]);
  });

  it("tells the user when there is no board to add a card to", () => {
    const { app } = harness({ dir });
    app.setView(app.config.defaultView);
    press(app, "n");
    expect(app.view).toBe("TitleBodyHelpLog");
    expect(toastMessages(app)).toEqual(["No board selected, create a board first"]);
  });
});
