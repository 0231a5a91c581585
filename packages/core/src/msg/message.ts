import {
  Err,
  IMPORTANCE_LEVELS,
  MessageSchema,
  Ok,
  type Importance,
  type Message,
  type Result,
  type Text,
} from "@tickwork/contracts";
import type { z } from "zod";
import { textEqual } from "./text";

/** A visible display message of normal importance. */
export function normalMessage(contents: Text[]): Message {
  return {
    kind: "display",
    importance: "normal",
    hidden: false,
    contents,
  };
}

/** Deep copy; the rgb tuples are immutable and shared. */
export function cloneMessage(message: Message): Message {
  return {
    ...message,
    contents: message.contents.map((text) => ({ ...text })),
  };
}

/**
 * Debug rendering: every text run followed by a single space, styles
 * dropped.
 */
export function formatMessage(message: Message): string {
  return message.contents.map((text) => `${text.text} `).join("");
}

export function messagesEqual(a: Message, b: Message): boolean {
  return (
    a.kind === b.kind &&
    a.importance === b.importance &&
    a.hidden === b.hidden &&
    a.contents.length === b.contents.length &&
    a.contents.every((text, i) => {
      const other = b.contents[i];
      return other !== undefined && textEqual(text, other);
    })
  );
}

/** Negative when `a` is less important than `b`. */
export function compareImportance(a: Importance, b: Importance): number {
  return IMPORTANCE_LEVELS.indexOf(a) - IMPORTANCE_LEVELS.indexOf(b);
}

/** Validate a message that arrived from outside the process. */
export function parseMessage(input: unknown): Result<Message, z.ZodError> {
  const parsed = MessageSchema.safeParse(input);
  if (!parsed.success) return Err(parsed.error);
  return Ok(parsed.data);
}
