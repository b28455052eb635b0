export * from "./parse";
export * from "./replies";
export * from "./run";
