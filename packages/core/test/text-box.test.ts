import { describe, expect, it } from "vitest";

import { key } from "../src/keys";
import { TextBox } from "../src/text-box";

describe("TextBox", () => {
  it("inserts at the cursor and undoes and redoes edits", () => {
    const box = new TextBox("hello");
    box.insertChar("!");
    expect(box.text).toBe("hello!");
    expect(box.undo()).toBe(true);
    expect(box.text).toBe("hello");
    expect(box.cursor).toEqual({ row: 0, col: 5 });
    expect(box.redo()).toBe(true);
    expect(box.text).toBe("hello!");
    expect(box.redo()).toBe(false);
  });

  it("joins lines on backspace at column 0 and restores them on undo", () => {
    const box = new TextBox("ab\ncd");
    box.move("Head");
    box.deleteChar();
    expect(box.text).toBe("abcd");
    expect(box.cursor).toEqual({ row: 0, col: 2 });
    box.undo();
    expect(box.lines).toEqual(["ab", "cd"]);
    expect(box.cursor).toEqual({ row: 1, col: 0 });
  });

  it("keeps single-line buffers on one line", () => {
    const box = new TextBox("", { singleLine: true });
    expect(box.input(key("enter"))).toBe(false);
    expect(box.insertNewline()).toBe(false);
    box.setText("a\nb");
    expect(box.text).toBe("a b");
    expect(box.input(key("up"))).toBe(false);
  });

  it("deletes the word before the cursor", () => {
    const box = new TextBox("foo bar");
    box.deleteWord();
    expect(box.text).toBe("foo ");
  });

  it("moves by words", () => {
    const box = new TextBox("foo bar");
    box.move("Top");
    box.move("WordForward");
    expect(box.cursor).toEqual({ row: 0, col: 4 });
    box.move("WordBack");
    expect(box.cursor).toEqual({ row: 0, col: 0 });
  });

  it("cuts a selection and pastes it back", () => {
    const box = new TextBox("hello world");
    box.move("Head");
    box.move("WordForward", true);
    expect(box.selectionRange()).toEqual({ start: { row: 0, col: 0 }, end: { row: 0, col: 6 } });
    expect(box.cut()).toBe(true);
    expect(box.text).toBe("world");
    expect(box.yank).toEqual({ kind: "Piece", text: "hello " });
    box.paste();
    expect(box.text).toBe("hello world");
  });

  it("replaces a select-all with typed text", () => {
    const box = new TextBox("old text");
    box.input(key("a", { ctrl: true }));
    box.input(key("x"));
    expect(box.text).toBe("x");
  });

  it("treats a grapheme cluster as one column", () => {
    const box = new TextBox("👍🏽x");
    expect(box.cursor).toEqual({ row: 0, col: 2 });
    box.deleteChar();
    box.deleteChar();
    expect(box.isEmpty()).toBe(true);
  });

  it("pads tabs to the next stop", () => {
    const box = new TextBox("a");
    box.insertTab();
    expect(box.text).toBe("a ");
    box.insertTab();
    expect(box.text).toBe("a   ");
  });

  it("masks display lines", () => {
    const box = new TextBox("abc", { mask: "•" });
    expect(box.displayLines()).toEqual(["•••"]);
    box.setMask(undefined);
    expect(box.displayLines()).toEqual(["abc"]);
  });
});
