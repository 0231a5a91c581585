import { SchedulerError, type Color, type RgbColor, type Text } from "@tickwork/contracts";

function isColorComponent(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 255;
}

/**
 * @throws {SchedulerError} `INVALID_COLOR` when a component is outside 0..255
 */
export function rgb(r: number, g: number, b: number): RgbColor {
  if (![r, g, b].every(isColorComponent)) {
    throw SchedulerError.create(
      "INVALID_COLOR",
      `RGB components must be integers in 0..255, got (${r}, ${g}, ${b})`,
      { r, g, b },
    );
  }
  return { rgb: [r, g, b] };
}

export function colorsEqual(a: Color, b: Color): boolean {
  if (typeof a === "string" || typeof b === "string") return a === b;
  return a.rgb.every((component, i) => component === b.rgb[i]);
}

function styled(text: string, bold: boolean, italic: boolean): Text {
  return { bold, italic, color: "default", backgroundColor: "default", text };
}

/** Unstyled text in the default colors. */
export function plainText(text: string): Text {
  return styled(text, false, false);
}

export function boldText(text: string): Text {
  return styled(text, true, false);
}

export function italicText(text: string): Text {
  return styled(text, false, true);
}

export function textEqual(a: Text, b: Text): boolean {
  return (
    a.text === b.text &&
    a.bold === b.bold &&
    a.italic === b.italic &&
    colorsEqual(a.color, b.color) &&
    colorsEqual(a.backgroundColor, b.backgroundColor)
  );
}
