import type { App, Region } from "./app";
import { dropDraggedCard } from "./card-actions";
import { accept, directional, goBack, togglePalette } from "./dispatcher";
import { completeTagSuggestion, pickDay } from "./forms";
import type { Direction } from "./projection";
import { isKanbanView } from "./ui-state";

export type MouseButton = "left" | "right" | "middle";

export type MouseEvent =
  | { type: "move"; x: number; y: number }
  | { type: "drag"; x: number; y: number }
  | { type: "press"; button: MouseButton; x: number; y: number }
  | { type: "release"; x: number; y: number }
  | { type: "scroll"; direction: Direction; x: number; y: number };

/** The topmost region under the pointer; later regions are drawn over earlier ones. */
export function regionAt(regions: readonly Region[], x: number, y: number): Region | undefined {
  for (let i = regions.length - 1; i >= 0; i--) {
    const r = regions[i];
    if (r && x >= r.x && x < r.x + r.width && y >= r.y && y < r.y + r.height) return r;
  }
  return undefined;
}

function track(app: App, x: number, y: number): Region | undefined {
  app.pointer = { x, y };
  const region = regionAt(app.regions, x, y);
  app.mouseFocus = region?.focus;
  app.hovered = region?.focus === "Body" ? { boardId: region.boardId, cardId: region.cardId } : {};
  return region;
}

/** Points focus and list selection at the region, if it belongs to the active view or popup. */
function focusRegion(app: App, region: Region): boolean {
  if (!app.targets().includes(region.focus)) return false;
  app.setFocus(region.focus);
  if (region.list !== undefined && region.row !== undefined) app.lists[region.list] = region.row;
  return true;
}

export function handleMouse(app: App, event: MouseEvent): void {
  if (!app.config.enableMouseSupport) return;
  switch (event.type) {
    case "move":
      track(app, event.x, event.y);
      return;
    case "drag": {
      track(app, event.x, event.y);
      const drag = app.drag;
      if (!drag) return;
      drag.x = event.x;
      drag.y = event.y;
      if (app.hovered.cardId !== drag.cardId) drag.moved = true;
      return;
    }
    case "scroll": {
      const region = track(app, event.x, event.y);
      if (region && app.status === "Initialized") focusRegion(app, region);
      directional(app, event.direction);
      return;
    }
    case "press":
      press(app, event.button, event.x, event.y);
      return;
    case "release":
      release(app, event.x, event.y);
      return;
  }
}

function press(app: App, button: MouseButton, x: number, y: number): void {
  const region = track(app, x, y);
  if (button === "right") {
    app.status = "Initialized";
    goBack(app);
    return;
  }
  if (button === "middle") {
    togglePalette(app);
    return;
  }
  if (region?.list === "tagSuggestion" && region.row !== undefined) {
    app.lists.tagSuggestion = region.row;
    completeTagSuggestion(app);
    return;
  }
  if (!region || !focusRegion(app, region)) return;
  if (app.status !== "KeyBindMode") app.status = "Initialized";
  if (region.day !== undefined) {
    pickDay(app, region.day);
    return;
  }
  if (region.focus === "Body" && isKanbanView(app.view) && !app.popup) {
    if (!region.boardId) return;
    app.select(region.boardId, region.cardId);
    if (region.cardId) app.drag = { boardId: region.boardId, cardId: region.cardId, x, y, moved: false };
    return;
  }
  accept(app);
}

/** A release after the pointer left the pressed card drops it; otherwise the press was a click on the card. */
function release(app: App, x: number, y: number): void {
  const region = track(app, x, y);
  const drag = app.drag;
  if (!drag) return;
  if (drag.moved) {
    dropDraggedCard(app, region?.focus === "Body" ? app.hovered : undefined);
    return;
  }
  app.drag = undefined;
  if (region?.cardId === drag.cardId) accept(app);
}
