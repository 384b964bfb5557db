import assert from 'node:assert/strict';
import test from 'node:test';

import {
  DEFAULT_PANEL_STYLE,
  buildPanelStyle,
  defaultInlineWidth,
  scaleFontSizes
} from '../src/rendering/style.js';
import { parseEnv } from '../src/utils/env.js';

const baseEnv = { DISCORD_TOKEN: 'test-token', DISCORD_CLIENT_ID: '1000' };

test('style: default environment yields the default style', () => {
  const style = buildPanelStyle(parseEnv(baseEnv));
  assert.deepEqual(style, DEFAULT_PANEL_STYLE);
  assert.deepEqual(style.titleStroke, { outline: 5, inline: 3 });
  assert.deepEqual(style.bodyStroke, { outline: 4, inline: 2 });
  assert.ok(Object.isFrozen(style));
});

test('style: scales font sizes and truncates', () => {
  assert.deepEqual(scaleFontSizes(1.5), { title: 84, label: 48, value: 51, note: 45, footer: 33 });
  assert.deepEqual(scaleFontSizes(0.5), { title: 28, label: 16, value: 17, note: 15, footer: 11 });
});

test('style: inline width defaults to two less than the outline, at least one', () => {
  assert.equal(defaultInlineWidth(5), 3);
  assert.equal(defaultInlineWidth(2), 1);
  assert.equal(defaultInlineWidth(0), 1);
});

test('style: environment overrides strokes, positions and opacity', () => {
  const style = buildPanelStyle(
    parseEnv({
      ...baseEnv,
      STROKE_TITLE: '7',
      INLINE_STROKE_TITLE: '0',
      STROKE_BODY: '6',
      LABEL_X: '80',
      VALUE_X: '400',
      BACKGROUND_ALPHA: '128',
      OVERLAY_OPACITY: '90',
      FONT_SCALE: '2'
    })
  );
  assert.deepEqual(style.titleStroke, { outline: 7, inline: 0 });
  assert.deepEqual(style.bodyStroke, { outline: 6, inline: 4 });
  assert.equal(style.labelX, 80);
  assert.equal(style.valueX, 400);
  assert.equal(style.backgroundAlpha, 128);
  assert.equal(style.overlayOpacity, 90);
  assert.equal(style.fontSizes.title, 112);
  assert.equal(style.width, 1200);
  assert.equal(style.height, 650);
});
