export * from "./commands";
export * from "./errors";
export * from "./exit-codes";
export * from "./flags";
export * from "./help";
export * from "./run";
export * from "./runtime";
export * from "./status-report";
