import { createCanvas, type Image, type SKRSContext2D } from '@napi-rs/canvas';

import type { ImageSource } from '../services/imageClient.js';
import type { FontHandle } from './fontResolver.js';
import { createTextMeasurer, drawStrokedText, type StrokeOptions } from './strokeText.js';
import type { PanelStyle, StrokeWidths } from './style.js';
import { wrapText } from './textLayout.js';

export interface EventSpec {
  title: string;
  dateTime: string;
  players: string;
  duration: string;
  note: string;
  backgroundUrl?: string;
  thumbnailUrl?: string;
}

export interface RenderedPanel {
  png: Buffer;
  width: number;
  height: number;
}

export interface FontSource {
  resolve(sizePx: number): Promise<FontHandle>;
}

export interface PanelRendererDeps {
  fonts: FontSource;
  images: ImageSource;
}

const BASE_COLOR = 'rgb(20, 22, 28)';
const ACCENT_COLOR = 'rgb(212, 175, 55)';
const ACCENT_WIDTH = 18;

const THUMB_SIZE = 340;
const THUMB_RADIUS = 28;
const THUMB_MARGIN = 28;

const OVERLAY_INSET = 40;

const TITLE_POSITION = { x: 70, y: 60 };
const ROWS_TOP = 140;
const ROW_GAP = 16;
const VALUE_OFFSET_Y = -2;
const NOTE_LABEL_GAP = 10;
// Keeps the note clear of the thumbnail column.
const NOTE_RIGHT_RESERVE = 380;
const FOOTER_X = 70;
const FOOTER_BOTTOM_OFFSET = 40;

const WHITE = 'rgb(255, 255, 255)';
const BLACK = 'rgb(0, 0, 0)';
const LABEL_COLOR = 'rgb(220, 220, 220)';
const NOTE_COLOR = 'rgb(245, 245, 245)';
const FOOTER_COLOR = 'rgb(200, 200, 200)';

export const PANEL_LABELS = {
  dateTime: '開催予定日',
  players: 'プレイヤー数',
  duration: '想定プレイ時間',
  note: '一言',
  footer: 'マーダーミステリー開催のお知らせ'
} as const;

export const PLAYERS_UNIT = '名';

export const formatPlayers = (value: string): string => {
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? `${trimmed} ${PLAYERS_UNIT}` : value;
};

const strokeOptions = (fill: string, widths: StrokeWidths): StrokeOptions => ({
  fill,
  outline: BLACK,
  outlineWidth: widths.outline,
  inlineWidth: widths.inline
});

/** Scales the image to cover the target box and crops the overflow evenly. */
const drawCover = (
  ctx: SKRSContext2D,
  image: Image,
  dx: number,
  dy: number,
  dw: number,
  dh: number
): void => {
  const scale = Math.max(dw / image.width, dh / image.height);
  const sw = dw / scale;
  const sh = dh / scale;
  const sx = (image.width - sw) / 2;
  const sy = (image.height - sh) / 2;
  ctx.drawImage(image, sx, sy, sw, sh, dx, dy, dw, dh);
};

const roundedRectPath = (ctx: SKRSContext2D, x: number, y: number, w: number, h: number, radius: number) => {
  const r = Math.max(0, Math.min(radius, w / 2, h / 2));
  ctx.beginPath();
  ctx.moveTo(x + r, y);
  ctx.arcTo(x + w, y, x + w, y + h, r);
  ctx.arcTo(x + w, y + h, x, y + h, r);
  ctx.arcTo(x, y + h, x, y, r);
  ctx.arcTo(x, y, x + w, y, r);
  ctx.closePath();
};

export const renderPanel = async (
  spec: EventSpec,
  style: Readonly<PanelStyle>,
  { fonts, images }: PanelRendererDeps
): Promise<RenderedPanel> => {
  const { width, height } = style;

  // Fetch first: nothing is drawn until both images settled.
  const [background, thumbnail, titleFont, labelFont, valueFont, noteFont, footerFont] = await Promise.all([
    spec.backgroundUrl ? images.fetch(spec.backgroundUrl) : Promise.resolve(null),
    spec.thumbnailUrl ? images.fetch(spec.thumbnailUrl) : Promise.resolve(null),
    fonts.resolve(style.fontSizes.title),
    fonts.resolve(style.fontSizes.label),
    fonts.resolve(style.fontSizes.value),
    fonts.resolve(style.fontSizes.note),
    fonts.resolve(style.fontSizes.footer)
  ]);

  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');

  ctx.fillStyle = BASE_COLOR;
  ctx.fillRect(0, 0, width, height);

  if (background) {
    ctx.save();
    ctx.globalAlpha = Math.max(0, Math.min(255, style.backgroundAlpha)) / 255;
    drawCover(ctx, background, 0, 0, width, height);
    ctx.restore();
  }

  ctx.fillStyle = ACCENT_COLOR;
  ctx.fillRect(0, 0, ACCENT_WIDTH, height);

  if (thumbnail) {
    const x = width - THUMB_SIZE - THUMB_MARGIN;
    const y = THUMB_MARGIN;
    ctx.save();
    roundedRectPath(ctx, x, y, THUMB_SIZE, THUMB_SIZE, THUMB_RADIUS);
    ctx.clip();
    drawCover(ctx, thumbnail, x, y, THUMB_SIZE, THUMB_SIZE);
    ctx.restore();
  }

  if (style.overlayOpacity > 0) {
    ctx.fillStyle = `rgba(0, 0, 0, ${Math.min(255, style.overlayOpacity) / 255})`;
    ctx.fillRect(OVERLAY_INSET, OVERLAY_INSET, width - OVERLAY_INSET * 2, height - OVERLAY_INSET * 2);
  }

  drawStrokedText(ctx, TITLE_POSITION, spec.title, titleFont.css, strokeOptions(WHITE, style.titleStroke));

  let y = ROWS_TOP;
  const rows: Array<[string, string]> = [
    [PANEL_LABELS.dateTime, spec.dateTime],
    [PANEL_LABELS.players, formatPlayers(spec.players)],
    [PANEL_LABELS.duration, spec.duration]
  ];
  for (const [label, value] of rows) {
    drawStrokedText(ctx, { x: style.labelX, y }, label, labelFont.css, strokeOptions(LABEL_COLOR, style.bodyStroke));
    drawStrokedText(
      ctx,
      { x: style.valueX, y: y + VALUE_OFFSET_Y },
      value,
      valueFont.css,
      strokeOptions(WHITE, style.bodyStroke)
    );
    y += valueFont.sizePx + ROW_GAP;
  }

  drawStrokedText(
    ctx,
    { x: style.labelX, y },
    PANEL_LABELS.note,
    labelFont.css,
    strokeOptions(LABEL_COLOR, style.bodyStroke)
  );
  y += labelFont.sizePx + NOTE_LABEL_GAP;

  const measurer = createTextMeasurer(ctx, noteFont.css);
  const note = wrapText(spec.note, measurer, width - style.labelX - NOTE_RIGHT_RESERVE);
  note.lines.forEach((line, index) => {
    drawStrokedText(
      ctx,
      { x: style.labelX, y: y + note.offsets[index] },
      line,
      noteFont.css,
      strokeOptions(NOTE_COLOR, style.bodyStroke)
    );
  });

  drawStrokedText(
    ctx,
    { x: FOOTER_X, y: height - FOOTER_BOTTOM_OFFSET },
    PANEL_LABELS.footer,
    footerFont.css,
    strokeOptions(FOOTER_COLOR, style.bodyStroke)
  );

  const png = await canvas.encode('png');
  return { png, width, height };
};
