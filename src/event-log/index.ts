export * from "./event-log";
export * from "./format";
