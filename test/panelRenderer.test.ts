import assert from 'node:assert/strict';
import test from 'node:test';

import { createCanvas, loadImage, type Image } from '@napi-rs/canvas';

import type { FontHandle } from '../src/rendering/fontResolver.js';
import { formatPlayers, renderPanel, type EventSpec, type FontSource } from '../src/rendering/panelRenderer.js';
import { DEFAULT_PANEL_STYLE } from '../src/rendering/style.js';
import type { ImageSource } from '../src/services/imageClient.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

class FallbackFonts implements FontSource {
  readonly requested: number[] = [];

  async resolve(sizePx: number): Promise<FontHandle> {
    this.requested.push(sizePx);
    return { family: 'sans-serif', sizePx, css: `${sizePx}px sans-serif` };
  }
}

class StubImages implements ImageSource {
  readonly requested: string[] = [];

  constructor(private readonly lookup: (url: string) => Image | null = () => null) {}

  async fetch(url: string): Promise<Image | null> {
    this.requested.push(url);
    return this.lookup(url);
  }
}

const solidImage = async (color: string): Promise<Image> => {
  const canvas = createCanvas(40, 20);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = color;
  ctx.fillRect(0, 0, 40, 20);
  return loadImage(await canvas.encode('png'));
};

type Rgb = [number, number, number];

const BASE: Rgb = [20, 22, 28];
const ACCENT: Rgb = [212, 175, 55];
const BACKGROUND: Rgb = [200, 40, 40];
const THUMBNAIL: Rgb = [30, 120, 200];

// Thumbnail box is (832, 28)-(1172, 368) on the default 1200x650 panel.
const ACCENT_POINT = { x: 5, y: 600 };
const THUMB_CORNER = { x: 833, y: 29 };
const THUMB_CENTER = { x: 1002, y: 198 };
// Clear of text, inside the overlay plate.
const OPEN_POINT = { x: 1100, y: 500 };
// Between the accent bar and the overlay plate.
const GUTTER_POINT = { x: 30, y: 600 };

const samplePixels = async (png: Buffer) => {
  const decoded = await loadImage(png);
  const canvas = createCanvas(decoded.width, decoded.height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(decoded, 0, 0);
  return ({ x, y }: { x: number; y: number }): Rgb => {
    const [r, g, b] = ctx.getImageData(x, y, 1, 1).data;
    return [r, g, b];
  };
};

const isDarker = (pixel: Rgb, than: Rgb): boolean => pixel.every((channel, index) => channel < than[index]);

const spec: EventSpec = {
  title: '館の殺人',
  dateTime: '2026/11/03 20:00〜',
  players: '6',
  duration: '約3時間',
  note: '初心者歓迎です。\nネタバレ厳禁でお願いします。'
};

test('panelRenderer: formats numeric player counts with a unit', () => {
  assert.equal(formatPlayers('6'), '6 名');
  assert.equal(formatPlayers(' 8 '), '8 名');
  assert.equal(formatPlayers('4〜6'), '4〜6');
  assert.equal(formatPlayers(''), '');
});

test('panelRenderer: renders a PNG at the style size without images', async () => {
  const fonts = new FallbackFonts();
  const images = new StubImages();
  const panel = await renderPanel(spec, DEFAULT_PANEL_STYLE, { fonts, images });

  assert.deepEqual(panel.png.subarray(0, 8), PNG_SIGNATURE);
  assert.equal(panel.width, 1200);
  assert.equal(panel.height, 650);
  const decoded = await loadImage(panel.png);
  assert.equal(decoded.width, 1200);
  assert.equal(decoded.height, 650);
  assert.deepEqual(images.requested, []);
  assert.deepEqual(fonts.requested, [56, 32, 34, 30, 22]);
});

test('panelRenderer: fetches background and thumbnail when given', async () => {
  const image = await solidImage('rgb(30, 120, 200)');
  const images = new StubImages(() => image);
  const panel = await renderPanel(
    { ...spec, backgroundUrl: 'https://img.example.com/bg.png', thumbnailUrl: 'https://img.example.com/key.png' },
    { ...DEFAULT_PANEL_STYLE, width: 600, height: 325, overlayOpacity: 120 },
    { fonts: new FallbackFonts(), images }
  );

  assert.deepEqual(images.requested, ['https://img.example.com/bg.png', 'https://img.example.com/key.png']);
  const decoded = await loadImage(panel.png);
  assert.equal(decoded.width, 600);
  assert.equal(decoded.height, 325);
});

test('panelRenderer: a failed image fetch still produces a panel', async () => {
  const images = new StubImages();
  const panel = await renderPanel(
    { ...spec, backgroundUrl: 'https://img.example.com/missing.png' },
    DEFAULT_PANEL_STYLE,
    { fonts: new FallbackFonts(), images }
  );
  assert.deepEqual(panel.png.subarray(0, 8), PNG_SIGNATURE);
});

test('panelRenderer: composites background, accent bar and rounded thumbnail in order', async () => {
  const background = await solidImage('rgb(200, 40, 40)');
  const thumbnail = await solidImage('rgb(30, 120, 200)');
  const images = new StubImages((url) => (url.endsWith('bg.png') ? background : thumbnail));
  const panel = await renderPanel(
    { ...spec, backgroundUrl: 'https://img.example.com/bg.png', thumbnailUrl: 'https://img.example.com/key.png' },
    DEFAULT_PANEL_STYLE,
    { fonts: new FallbackFonts(), images }
  );
  const pixel = await samplePixels(panel.png);

  assert.deepEqual(pixel(ACCENT_POINT), ACCENT);
  assert.deepEqual(pixel(THUMB_CORNER), BACKGROUND);
  assert.deepEqual(pixel(THUMB_CENTER), THUMBNAIL);
  assert.deepEqual(pixel(OPEN_POINT), BACKGROUND);
});

test('panelRenderer: shows the base colour without a background', async () => {
  const panel = await renderPanel(spec, DEFAULT_PANEL_STYLE, { fonts: new FallbackFonts(), images: new StubImages() });
  const pixel = await samplePixels(panel.png);

  assert.deepEqual(pixel(OPEN_POINT), BASE);
  assert.deepEqual(pixel(THUMB_CENTER), BASE);
  assert.deepEqual(pixel(ACCENT_POINT), ACCENT);
});

test('panelRenderer: blends the background by its alpha', async () => {
  const background = await solidImage('rgb(200, 40, 40)');
  const panel = await renderPanel(
    { ...spec, backgroundUrl: 'https://img.example.com/bg.png' },
    { ...DEFAULT_PANEL_STYLE, backgroundAlpha: 128 },
    { fonts: new FallbackFonts(), images: new StubImages(() => background) }
  );
  const [red] = (await samplePixels(panel.png))(OPEN_POINT);

  // 20 + (200 - 20) * 128 / 255 is about 110.
  assert.ok(red >= 106 && red <= 115, `red channel ${red}`);
});

test('panelRenderer: the overlay plate darkens the inset area and the thumbnail', async () => {
  const thumbnail = await solidImage('rgb(30, 120, 200)');
  const panel = await renderPanel(
    { ...spec, thumbnailUrl: 'https://img.example.com/key.png' },
    { ...DEFAULT_PANEL_STYLE, overlayOpacity: 120 },
    { fonts: new FallbackFonts(), images: new StubImages(() => thumbnail) }
  );
  const pixel = await samplePixels(panel.png);

  assert.ok(isDarker(pixel(OPEN_POINT), BASE));
  assert.ok(isDarker(pixel(THUMB_CENTER), THUMBNAIL));
  assert.deepEqual(pixel(GUTTER_POINT), BASE);
});
