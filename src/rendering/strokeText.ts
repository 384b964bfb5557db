import type { TextExtent, TextMeasurer } from './textLayout.js';

/** The slice of a 2D canvas context that text drawing needs. */
export interface TextSurface {
  font: string;
  fillStyle: string | object;
  strokeStyle: string | object;
  lineWidth: number;
  lineJoin: 'bevel' | 'miter' | 'round';
  textBaseline: 'alphabetic' | 'bottom' | 'hanging' | 'ideographic' | 'middle' | 'top';
  save(): void;
  restore(): void;
  fillText(text: string, x: number, y: number): void;
  strokeText(text: string, x: number, y: number): void;
  measureText(text: string): {
    width: number;
    actualBoundingBoxAscent: number;
    actualBoundingBoxDescent: number;
    actualBoundingBoxLeft: number;
    actualBoundingBoxRight: number;
  };
}

export interface StrokeOptions {
  fill: string;
  outline: string;
  /** Pixels the dark border extends past the glyph edge; 0 skips the border pass. */
  outlineWidth: number;
  /** Pixels the fill-colored stroke thickens the glyph; 0 draws a plain fill. */
  inlineWidth: number;
}

export interface Point {
  x: number;
  y: number;
}

export const drawStrokedText = (
  surface: TextSurface,
  { x, y }: Point,
  text: string,
  font: string,
  { fill, outline, outlineWidth, inlineWidth }: StrokeOptions
): void => {
  surface.save();
  surface.font = font;
  surface.textBaseline = 'top';
  surface.lineJoin = 'round';

  if (outlineWidth > 0) {
    surface.strokeStyle = outline;
    surface.lineWidth = outlineWidth * 2;
    surface.strokeText(text, x, y);
    surface.fillStyle = fill;
    surface.fillText(text, x, y);
  }

  surface.fillStyle = fill;
  if (inlineWidth > 0) {
    surface.strokeStyle = fill;
    surface.lineWidth = inlineWidth * 2;
    surface.strokeText(text, x, y);
  }
  surface.fillText(text, x, y);

  surface.restore();
};

/** Measures ink bounds of text in the given font, the way layout expects them. */
export const createTextMeasurer = (surface: TextSurface, font: string): TextMeasurer => ({
  measure(text: string): TextExtent {
    surface.save();
    surface.font = font;
    surface.textBaseline = 'top';
    const metrics = surface.measureText(text);
    surface.restore();
    return {
      width: Math.ceil(metrics.actualBoundingBoxLeft + metrics.actualBoundingBoxRight),
      height: Math.ceil(metrics.actualBoundingBoxAscent + metrics.actualBoundingBoxDescent)
    };
  }
});
