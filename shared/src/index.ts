export * from "./types";
export * from "./game/board";
export * from "./game/collect";
export * from "./game/constants";
export * from "./game/errors";
export * from "./game/move";
export * from "./game/notation";
export * from "./game/parse";
export * from "./game/render";
export * from "./game/report";
export * from "./game/rules";
export * from "./game/walk";
