import { describe, expect, it } from "vitest";

import {
  actionForKey,
  actionLabel,
  defaultKeyBindings,
  key,
  keyChar,
  keyToString,
  parseKey,
  parseKeyBindings,
  serializeKeyBindings,
} from "../src/keys";

describe("parseKey", () => {
  it("parses modifiers and named keys", () => {
    expect(parseKey("ctrl-c")).toEqual({ name: "c", ctrl: true, alt: false, shift: false });
    expect(parseKey("shift-up")).toEqual({ name: "up", ctrl: false, alt: false, shift: true });
    expect(parseKey("Escape")).toEqual(key("esc"));
    expect(parseKey(" ")).toBeUndefined();
  });

  it("keeps character case in the name", () => {
    expect(parseKey("D")).toEqual(key("D"));
    expect(parseKey("shift-d")).toEqual(key("D"));
  });

  it("rejects empty and multi-character specs", () => {
    expect(parseKey("")).toBeUndefined();
    expect(parseKey("abc")).toBeUndefined();
  });

  it("prints keys in modifier order", () => {
    expect(keyToString(key("x", { alt: true, ctrl: true }))).toBe("ctrl-alt-x");
  });

  it("types characters only for plain keys", () => {
    expect(keyChar(key("a"))).toBe("a");
    expect(keyChar(key("space"))).toBe(" ");
    expect(keyChar(key("a", { ctrl: true }))).toBeUndefined();
    expect(keyChar(key("enter"))).toBeUndefined();
  });
});

describe("key bindings", () => {
  it("resolves the default actions", () => {
    const bindings = defaultKeyBindings();
    expect(actionForKey(bindings, key("q"))).toBe("quit");
    expect(actionForKey(bindings, key("d"))).toBe("delete_card");
    expect(actionForKey(bindings, key("D"))).toBe("delete_board");
    expect(actionForKey(bindings, key("up", { shift: true }))).toBe("move_card_up");
    expect(actionForKey(bindings, key("z"))).toBeUndefined();
  });

  it("overrides single actions and keeps the rest", () => {
    const parsed = parseKeyBindings({ quit: ["x"] });
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.bindings.quit).toEqual([key("x")]);
    expect(parsed.bindings.new_card).toEqual([key("n")]);
  });

  it("refuses overlapping bindings", () => {
    expect(parseKeyBindings({ quit: ["n"] })).toEqual({
      ok: false,
      error: "Overlapping keybindings: 'n' is bound to quit, new_card",
    });
  });

  it("warns about unknown actions and bad keys", () => {
    const parsed = parseKeyBindings({ bogus: ["x"], up: [3] });
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.warnings).toEqual(["Unknown keybinding action: bogus", "Invalid key '3' for up"]);
    expect(parsed.bindings.up).toEqual([key("up")]);
  });

  it("serializes back to key specs", () => {
    const out = serializeKeyBindings(defaultKeyBindings());
    expect(out.delete_board).toEqual(["D"]);
    expect(out.move_card_up).toEqual(["shift-up"]);
    expect(out.quit).toEqual(["ctrl-c", "q"]);
  });

  it("labels actions for display", () => {
    expect(actionLabel("move_card_up")).toBe("Move card up");
  });
});
