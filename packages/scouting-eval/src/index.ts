export * from "./types";
export * from "./errors";
export * from "./schema";
export * from "./parsers";
export * from "./prompts";
export * from "./adapters";
export * from "./config";
export * from "./concurrency";
export * from "./documents";
export * from "./evaluator";
export * from "./batch";
export * from "./batch-renderer";
