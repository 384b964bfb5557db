import type { Env } from '../utils/env.js';

export interface StrokeWidths {
  outline: number;
  inline: number;
}

export interface FontSizes {
  title: number;
  label: number;
  value: number;
  note: number;
  footer: number;
}

export interface PanelStyle {
  width: number;
  height: number;
  /** Opacity of the background image, 0–255. */
  backgroundAlpha: number;
  /** Opacity of the dark overlay plate, 0–255; 0 disables it. */
  overlayOpacity: number;
  fontSizes: FontSizes;
  titleStroke: StrokeWidths;
  bodyStroke: StrokeWidths;
  labelX: number;
  valueX: number;
}

const BASE_FONT_SIZES: FontSizes = {
  title: 56,
  label: 32,
  value: 34,
  note: 30,
  footer: 22
};

export const scaleFontSizes = (scale: number): FontSizes => ({
  title: Math.trunc(BASE_FONT_SIZES.title * scale),
  label: Math.trunc(BASE_FONT_SIZES.label * scale),
  value: Math.trunc(BASE_FONT_SIZES.value * scale),
  note: Math.trunc(BASE_FONT_SIZES.note * scale),
  footer: Math.trunc(BASE_FONT_SIZES.footer * scale)
});

export const defaultInlineWidth = (outline: number): number => Math.max(outline - 2, 1);

export const DEFAULT_PANEL_STYLE: Readonly<PanelStyle> = Object.freeze({
  width: 1200,
  height: 650,
  backgroundAlpha: 255,
  overlayOpacity: 0,
  fontSizes: scaleFontSizes(1),
  titleStroke: { outline: 5, inline: defaultInlineWidth(5) },
  bodyStroke: { outline: 4, inline: defaultInlineWidth(4) },
  labelX: 74,
  valueX: 360
});

type StyleEnv = Pick<
  Env,
  | 'FONT_SCALE'
  | 'STROKE_TITLE'
  | 'STROKE_BODY'
  | 'INLINE_STROKE_TITLE'
  | 'INLINE_STROKE_BODY'
  | 'LABEL_X'
  | 'VALUE_X'
  | 'BACKGROUND_ALPHA'
  | 'OVERLAY_OPACITY'
>;

export const buildPanelStyle = (env: StyleEnv): Readonly<PanelStyle> =>
  Object.freeze({
    ...DEFAULT_PANEL_STYLE,
    backgroundAlpha: env.BACKGROUND_ALPHA,
    overlayOpacity: env.OVERLAY_OPACITY,
    fontSizes: scaleFontSizes(env.FONT_SCALE),
    titleStroke: {
      outline: env.STROKE_TITLE,
      inline: env.INLINE_STROKE_TITLE ?? defaultInlineWidth(env.STROKE_TITLE)
    },
    bodyStroke: {
      outline: env.STROKE_BODY,
      inline: env.INLINE_STROKE_BODY ?? defaultInlineWidth(env.STROKE_BODY)
    },
    labelX: env.LABEL_X,
    valueX: env.VALUE_X
  });
