export * from "./schema";
export * from "./outcome";
export * from "./ports";
export * from "./logger";
export * from "./mutex";
export * from "./privilege";
export * from "./memory";
export * from "./registry";
export * from "./ban-log";
export * from "./fanout";
export * from "./propagator";
export * from "./service";
