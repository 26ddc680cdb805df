export * from "./base";
export * from "./service";
export * from "./categorize";
