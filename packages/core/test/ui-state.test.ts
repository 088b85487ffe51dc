import { describe, expect, it } from "vitest";

import { clampFocus, nextFocus, prevFocus, viewTargets } from "../src/ui-state";

describe("focus targets", () => {
  it("keeps a focus that is still available", () => {
    expect(clampFocus(viewTargets("TitleBodyLog"), "Log")).toBe("Log");
  });

  it("falls back to the first target, Title included", () => {
    expect(clampFocus(viewTargets("TitleBody"), "Help")).toBe("Title");
    expect(clampFocus(viewTargets("NewCard"), "Body")).toBe("NewCardName");
    expect(clampFocus([], "Body")).toBe("NoFocus");
  });

  it("cycles through the targets in both directions", () => {
    const targets = viewTargets("TitleBodyHelp");
    expect(nextFocus(targets, "Help")).toBe("Title");
    expect(prevFocus(targets, "Title")).toBe("Help");
    expect(prevFocus(targets, "MainMenu")).toBe("Help");
  });
});
