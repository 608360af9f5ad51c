export * from "./identity";
export * from "./roster";
export * from "./sampling";
export * from "./ai";
export * from "./providers";
export * from "./prompts";
export * from "./reports";
export * from "./config";
export * from "./errors";
export * from "./logger";
