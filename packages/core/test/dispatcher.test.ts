import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { App, Region } from "../src/app";
import { searchCards, searchCommands } from "../src/command-palette";
import { createBoard, createCard } from "../src/model";
import { handleMouse } from "../src/mouse";
import { harness, press, tempDir, toastMessages, type } from "./helpers";

function boardsFixture() {
  const c1 = createCard({ name: "c1" });
  const deploy = createCard({ name: "Deploy", description: "push the release" });
  const a = createBoard({ name: "A", cards: [c1, deploy] });
  const b = createBoard({ name: "B", description: "waiting room" });
  return { a, b, c1, deploy };
}

describe("keyboard dispatch", () => {
  let dir: string;
  let app: App;

  beforeEach(async () => {
    dir = await tempDir();
    app = harness({ dir }).app;
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("walks the main menu with wrap-around and opens the selected item", () => {
    expect(app.focus).toBe("MainMenu");
    press(app, "up");
    expect(app.lists.mainMenu).toBe(4);
    press(app, "down", "down", "down", "enter");
    expect(app.view).toBe("HelpMenu");
  });

  it("cycles focus through the panels of the board view", () => {
    const { a, b } = boardsFixture();
    app.setBoards([a, b]);
    app.setView("TitleBodyHelpLog");
    const seen: string[] = [];
    for (let i = 0; i < 4; i++) {
      press(app, "tab");
      seen.push(app.focus);
    }
    expect(seen).toEqual(["Help", "Log", "Title", "Body"]);
  });

  it("hides the focused panel and keeps the rest of the layout", () => {
    app.setView("TitleBodyHelpLog");
    press(app, "tab");
    expect(app.focus).toBe("Help");
    press(app, "h");
    expect(app.view).toBe("TitleBodyLog");
    expect(app.focus).toBe("Body");
  });

  it("moves the selection with the arrow keys and reports the edges", () => {
    const { a, b, c1, deploy } = boardsFixture();
    app.setBoards([a, b]);
    app.setView("TitleBodyHelpLog");
    expect(app.visible.selection).toEqual({ boardId: a.id, cardId: c1.id });

    press(app, "down");
    expect(app.visible.selection.cardId).toBe(deploy.id);
    press(app, "left");
    expect(toastMessages(app)).toEqual(["Cannot go Left: Already at first board"]);
  });

  it("deletes the selected card and selects its neighbour", () => {
    const { a, b, c1, deploy } = boardsFixture();
    app.setBoards([a, b]);
    app.setView("TitleBodyHelpLog");
    app.select(a.id, c1.id);

    press(app, "d");
    expect(a.cards.map((c) => c.name)).toEqual(["Deploy"]);
    expect(app.visible.selection).toEqual({ boardId: a.id, cardId: deploy.id });
    expect(toastMessages(app)).toEqual(["Deleted card 'c1'"]);
  });

  it("refuses a new board whose name is already used", () => {
    const { a, b } = boardsFixture();
    app.setBoards([a, b]);
    app.setView("TitleBodyHelpLog");
    press(app, "b", "enter");
    type(app, "B");
    press(app, "enter", "enter", "enter");

    expect(app.boards.map((board) => board.name)).toEqual(["A", "B"]);
    expect(app.view).toBe("NewBoard");
    expect(app.focus).toBe("NewBoardName");
    expect(app.toasts.last()?.message).toBe("Board with name 'B' already exists");
    expect(app.history.size).toBe(0);
  });

  it("changes the card status and priority from their shortcuts", () => {
    const { a, c1 } = boardsFixture();
    app.setBoards([a]);
    app.setView("TitleBodyHelpLog");
    app.select(a.id, c1.id);

    press(app, "1", "4");
    expect(c1.status).toBe("Complete");
    expect(c1.priority).toBe("High");
    expect(app.history.size).toBe(2);
    press(app, "1");
    expect(app.toasts.last()?.message).toBe("Card 'c1' is already Complete");
  });

  describe("command palette", () => {
    it("finds commands by prefix before substring", () => {
      expect(searchCommands("log")).toEqual(["Login", "Logout"]);
      expect(searchCommands("theme")).toEqual(["Change Theme", "Create a Theme"]);
      expect(searchCommands("")).toHaveLength(24);
    });

    it("reports which field of a card matched", () => {
      const { a, b, deploy } = boardsFixture();
      expect(searchCards([a, b], "release")).toEqual([{ id: deploy.id, label: "Deploy - Matched in Description" }]);
      expect(searchCards([a, b], "  ")).toEqual([]);
    });

    it("runs a command typed into the palette", () => {
      app.setView("TitleBodyHelpLog");
      press(app, "ctrl-p");
      expect(app.popup).toBe("CommandPalette");
      expect(app.status).toBe("UserInput");
      type(app, "expo");
      press(app, "enter");
      expect(app.popup).toBeUndefined();
      expect(app.io.drain()).toEqual([{ type: "ExportToJson" }]);
    });

    it("jumps to a card found by the palette and opens it", () => {
      const { a, b, deploy } = boardsFixture();
      app.setBoards([a, b]);
      app.setView("TitleBodyHelpLog");
      press(app, "ctrl-p");
      type(app, "depl");
      press(app, "tab");
      expect(app.focus).toBe("CommandPaletteCard");
      press(app, "enter");
      expect(app.popup).toBe("ViewCard");
      expect(app.visible.selection).toEqual({ boardId: a.id, cardId: deploy.id });
      expect(app.buffers.cardName.text).toBe("Deploy");
    });

    it("starts a list from its first row after tabbing away from it", () => {
      const api = createCard({ name: "Deploy api" });
      const web = createCard({ name: "Deploy web" });
      app.setBoards([createBoard({ name: "Ops", cards: [api, web] })]);
      app.setView("TitleBodyHelpLog");
      press(app, "ctrl-p");
      type(app, "deploy");
      press(app, "tab", "down");
      expect(app.focus).toBe("CommandPaletteCard");
      expect(app.lists.paletteCard).toBe(1);

      press(app, "tab");
      expect(app.focus).toBe("CommandPaletteBoard");
      expect(app.lists.paletteCard).toBe(0);

      press(app, "backtab", "down", "backtab");
      expect(app.focus).toBe("CommandPaletteCommand");
      expect(app.lists.paletteCard).toBe(0);
    });
  });
});

describe("mouse dispatch", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function withRegions(enableMouseSupport = true) {
    const { app } = harness({ dir, config: { enableMouseSupport } });
    const { a, b, c1 } = boardsFixture();
    app.setBoards([a, b]);
    app.setView("TitleBodyHelpLog");
    const regions: Region[] = [
      { focus: "Body", x: 0, y: 0, width: 15, height: 10, boardId: a.id },
      { focus: "Body", x: 0, y: 1, width: 15, height: 3, boardId: a.id, cardId: c1.id },
      { focus: "Body", x: 20, y: 0, width: 15, height: 10, boardId: b.id },
    ];
    app.regions = regions;
    return { app, a, b, c1 };
  }

  it("opens a card on click", () => {
    const { app, a, c1 } = withRegions();
    handleMouse(app, { type: "press", button: "left", x: 2, y: 2 });
    expect(app.visible.selection).toEqual({ boardId: a.id, cardId: c1.id });
    expect(app.popup).toBeUndefined();
    handleMouse(app, { type: "release", x: 2, y: 2 });
    expect(app.popup).toBe("ViewCard");
  });

  it("drags a card onto another board", () => {
    const { app, a, b, c1 } = withRegions();
    handleMouse(app, { type: "press", button: "left", x: 2, y: 2 });
    handleMouse(app, { type: "drag", x: 25, y: 5 });
    handleMouse(app, { type: "release", x: 25, y: 5 });

    expect(a.cards.map((c) => c.name)).toEqual(["Deploy"]);
    expect(b.cards.map((c) => c.name)).toEqual(["c1"]);
    expect(app.history.size).toBe(1);
    expect(app.visible.selection).toEqual({ boardId: b.id, cardId: c1.id });
  });

  it("moves between boards on a sideways scroll", () => {
    const { app, a, b, c1 } = withRegions();
    handleMouse(app, { type: "scroll", direction: "Right", x: 2, y: 5 });
    expect(app.visible.selection).toEqual({ boardId: b.id, cardId: undefined });
    handleMouse(app, { type: "scroll", direction: "Left", x: 25, y: 5 });
    expect(app.visible.selection).toEqual({ boardId: a.id, cardId: c1.id });
    handleMouse(app, { type: "scroll", direction: "Left", x: 2, y: 5 });
    expect(app.toasts.last()?.message).toBe("Cannot go Left: Already at first board");
  });

  it("goes back on a right click", () => {
    const { app } = withRegions();
    handleMouse(app, { type: "press", button: "right", x: 2, y: 2 });
    expect(app.view).toBe("MainMenu");
  });

  it("ignores the mouse when mouse support is off", () => {
    const { app } = withRegions(false);
    handleMouse(app, { type: "press", button: "left", x: 2, y: 2 });
    handleMouse(app, { type: "release", x: 2, y: 2 });
    expect(app.popup).toBeUndefined();
    expect(app.pointer).toBeUndefined();
  });
});

describe("date picker", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("picks a due date for the card being viewed", () => {
    const { app } = harness({ dir, config: { dateTimeFormat: "DayMonthYear" } });
    const card = createCard({ name: "c1", dueDate: "05/03/2030" });
    app.setBoards([createBoard({ name: "A", cards: [card] })]);
    app.setView("TitleBodyHelpLog");
    press(app, "enter", "tab", "tab");
    expect(app.focus).toBe("CardDueDate");

    press(app, "enter");
    expect(app.popup).toBe("DateTimePicker");
    expect(app.focus).toBe("DatePickerCalendar");
    expect(app.isNestedPopup()).toBe(true);

    press(app, "right", "down", "tab", "down");
    expect(app.datePicker?.selected).toMatchObject({ year: 2030, month: 4, day: 13 });

    press(app, "enter");
    expect(app.popup).toBe("ViewCard");
    expect(app.focus).toBe("CardDueDate");
    expect(app.buffers.cardDueDate.text).toBe("13/04/2030");

    press(app, "tab", "tab", "tab", "tab", "tab", "enter");
    expect(app.boards[0]?.cards[0]?.dueDate).toBe("13/04/2030");
  });

  it("sets a time on a new card's due date", () => {
    const now = new Date(2030, 0, 31, 9, 15, 0).getTime();
    const { app } = harness({ dir, config: { dateTimeFormat: "DayMonthYear" }, now: () => now });
    const { a } = boardsFixture();
    app.setBoards([a]);
    app.setView("TitleBodyHelpLog");
    press(app, "n", "tab", "tab");
    expect(app.focus).toBe("NewCardDueDate");

    press(app, "enter");
    expect(app.popup).toBe("DateTimePicker");
    expect(app.isNestedPopup()).toBe(false);

    press(app, "tab", "tab", "tab", "tab");
    expect(app.focus).toBe("DatePickerCalendar");

    press(app, "tab", "tab", "tab", "enter", "tab");
    expect(app.datePicker?.timeOpen).toBe(true);
    expect(app.focus).toBe("DatePickerHour");

    press(app, "down", "right", "up", "enter");
    expect(app.popup).toBeUndefined();
    expect(app.view).toBe("NewCard");
    expect(app.focus).toBe("NewCardDueDate");
    expect(app.buffers.newCardDueDate.text).toBe("31/01/2030-10:14:00");
  });

  it("selects a clicked day without closing", () => {
    const { app } = harness({ dir, config: { dateTimeFormat: "DayMonthYear" } });
    const { a } = boardsFixture();
    app.setBoards([a]);
    app.setView("TitleBodyHelpLog");
    press(app, "n");
    app.buffers.newCardDueDate.setText("05/03/2030");
    app.openDatePicker("NewCardDueDate");
    app.regions = [{ focus: "DatePickerCalendar", x: 0, y: 0, width: 3, height: 1, day: 20 }];
    handleMouse(app, { type: "press", button: "left", x: 1, y: 0 });
    expect(app.popup).toBe("DateTimePicker");
    expect(app.datePicker?.selected).toMatchObject({ year: 2030, month: 3, day: 20 });
  });
});

describe("tag suggestions", () => {
  let dir: string;
  let app: App;

  beforeEach(async () => {
    dir = await tempDir();
    app = harness({ dir }).app;
    const viewed = createCard({ name: "viewed", tags: ["ui"] });
    const fix = createCard({ name: "fix", tags: ["backend", "bug"] });
    const beta = createCard({ name: "beta", tags: ["backend", "beta"] });
    app.setBoards([createBoard({ name: "A", cards: [viewed, fix, beta] })]);
    app.setView("TitleBodyHelpLog");
    press(app, "enter", "tab", "tab", "tab", "tab", "tab", "enter");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("offers known tags for the fragment being typed", () => {
    expect(app.focus).toBe("CardTags");
    expect(app.status).toBe("UserInput");
    expect(app.tagSuggestions()).toEqual([]);
    type(app, ",b");
    expect(app.tagSuggestions()).toEqual(["backend", "beta", "bug"]);

    press(app, "down", "tab");
    expect(app.buffers.cardTags.text).toBe("ui, beta");
    expect(app.focus).toBe("CardTags");
    expect(app.tagSuggestions()).toEqual([]);
  });

  it("completes a clicked suggestion", () => {
    type(app, ",b");
    app.regions = [{ focus: "CardTags", x: 0, y: 5, width: 10, height: 1, list: "tagSuggestion", row: 2 }];
    handleMouse(app, { type: "press", button: "left", x: 2, y: 5 });
    expect(app.buffers.cardTags.text).toBe("ui, bug");
  });
});
