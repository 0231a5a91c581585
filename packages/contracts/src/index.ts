export * from "./schemas/message";
export * from "./schemas/scheduler";
export * from "./types/error";
export * from "./types/logger";
export * from "./types/message";
export * from "./types/result";
export * from "./types/scheduler";
export * from "./utils/builder";
