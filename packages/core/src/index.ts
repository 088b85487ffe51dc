export * from "./app";
export * from "./boards";
export * from "./card-actions";
export * from "./cloud";
export * from "./command-palette";
export * from "./config";
export * from "./crypto";
export * from "./date-picker";
export * from "./dates";
export * from "./dispatcher";
export * from "./errors";
export * from "./files";
export * from "./filter";
export * from "./forms";
export * from "./history";
export * from "./ids";
export * from "./io-events";
export * from "./io-handler";
export * from "./keys";
export * from "./logger";
export * from "./model";
export * from "./mouse";
export * from "./mutex";
export * from "./password";
export * from "./persistence";
export * from "./projection";
export * from "./queue";
export * from "./text-box";
export * from "./themes";
export * from "./toast";
export * from "./ui-state";
