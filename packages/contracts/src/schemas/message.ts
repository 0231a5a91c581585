import { z } from "zod";
import { IMPORTANCE_LEVELS, NAMED_COLORS } from "../types/message";

const ColorComponentSchema = z
  .number()
  .int()
  .min(0, { error: "Color components must be in 0..255" })
  .max(255, { error: "Color components must be in 0..255" });

export const ColorSchema = z.union([
  z.enum(NAMED_COLORS),
  z.object({
    rgb: z.tuple([ColorComponentSchema, ColorComponentSchema, ColorComponentSchema]),
  }),
]);

export const TextSchema = z.object({
  bold: z.boolean(),
  italic: z.boolean(),
  color: ColorSchema,
  backgroundColor: ColorSchema,
  text: z.string(),
});

export const MessageSchema = z.object({
  kind: z.enum(["display", "debug", "warning", "error"]),
  importance: z.enum(IMPORTANCE_LEVELS),
  hidden: z.boolean(),
  contents: z.array(TextSchema),
});
