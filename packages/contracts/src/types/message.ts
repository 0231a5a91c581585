export type MessageKind = "display" | "debug" | "warning" | "error";

/** Ordered from least to most important. */
export const IMPORTANCE_LEVELS = [
  "hidden",
  "verbose",
  "low",
  "normal",
  "high",
  "veryHigh",
] as const;

export type Importance = (typeof IMPORTANCE_LEVELS)[number];

export const NAMED_COLORS = [
  "default",
  "white",
  "gray",
  "black",
  "red",
  "orange",
  "yellow",
  "green",
  "pink",
  "blue",
] as const;

export type NamedColor = (typeof NAMED_COLORS)[number];

export type RgbColor = { readonly rgb: readonly [number, number, number] };

export type Color = NamedColor | RgbColor;

/** A run of text sharing one style. */
export interface Text {
  bold: boolean;
  italic: boolean;
  color: Color;
  backgroundColor: Color;
  text: string;
}

/**
 * Structured text meant for a log or display sink. Carries no behavior; a
 * renderer decides what `kind` and `importance` look like.
 */
export interface Message {
  kind: MessageKind;
  importance: Importance;
  hidden: boolean;
  contents: Text[];
}
