export * from "./handlers";
export * from "./platform-client";
