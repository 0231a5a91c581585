// Scheduling
export { UpdateQueue } from "./update/update-queue";
export { BaseUpdatable, type Updatable } from "./update/updatable";
export {
  EffectBuffer,
  isLogEffect,
  logEffect,
  type Effect,
  type EffectSink,
  type LogEffect,
} from "./update/effect";
export { runUntilIdle, type RunOptions, type RunSummary } from "./loop/run";

// Entities
export { Messenger, type MessengerOptions } from "./entities/messenger";
export { Repeater, type RepeaterAction } from "./entities/repeater";

// Messages
export {
  cloneMessage,
  compareImportance,
  formatMessage,
  messagesEqual,
  normalMessage,
  parseMessage,
} from "./msg/message";
export {
  boldText,
  colorsEqual,
  italicText,
  plainText,
  rgb,
  textEqual,
} from "./msg/text";

// Support
export { MinHeap, type MinHeapCompare } from "./data-structures/min-heap";
export { createConsoleLogger, silentLogger } from "./logging/logger";
