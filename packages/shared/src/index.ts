export * from "./errors";
export * from "./hash";
export * from "./schemas";
export type * from "./types";
