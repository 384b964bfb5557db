import { access, mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { GlobalFonts } from '@napi-rs/canvas';
import axios from 'axios';

import { describeError, logger } from '../utils/logger.js';

export interface FontHandle {
  family: string;
  sizePx: number;
  /** Value for `CanvasRenderingContext2D.font`. */
  css: string;
}

export interface FontRegistry {
  registerFromPath(path: string, family: string): boolean;
}

export type FontDownloader = (url: string) => Promise<Buffer>;

export const PANEL_FONT_FAMILY = 'EventPanelSans';
export const FALLBACK_FONT_FAMILY = 'sans-serif';

export const DEFAULT_FONT_CANDIDATES = [
  'fonts/NotoSansJP-VariableFont_wght.ttf',
  'fonts/NotoSansJP-Regular.otf',
  'fonts/NotoSansJP-Regular.ttf',
  'fonts/NotoSerifJP-Regular.otf',
  '/usr/share/fonts/opentype/noto/NotoSansCJKjp-Regular.otf',
  '/usr/share/fonts/truetype/noto/NotoSansJP-Regular.ttf'
];

const FONT_DOWNLOAD_TIMEOUT_MS = 15_000;

const globalFontRegistry: FontRegistry = {
  registerFromPath: (path, family) => GlobalFonts.registerFromPath(path, family)
};

const downloadFont: FontDownloader = async (url) => {
  const { data } = await axios.get<ArrayBuffer>(url, {
    responseType: 'arraybuffer',
    timeout: FONT_DOWNLOAD_TIMEOUT_MS
  });
  return Buffer.from(data);
};

const fileExists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

interface FontResolverOptions {
  fontPath?: string;
  fontUrl?: string;
  candidates?: string[];
  cachePath?: string;
  registry?: FontRegistry;
  download?: FontDownloader;
}

export class FontResolver {
  private readonly fontPath?: string;
  private readonly fontUrl?: string;
  private readonly candidates: string[];
  private readonly cachePath: string;
  private readonly registry: FontRegistry;
  private readonly download: FontDownloader;
  private loading: Promise<string> | null = null;

  constructor(options: FontResolverOptions = {}) {
    this.fontPath = options.fontPath;
    this.fontUrl = options.fontUrl;
    this.candidates = options.candidates ?? DEFAULT_FONT_CANDIDATES;
    this.cachePath = options.cachePath ?? join(tmpdir(), 'event-panel-font.ttf');
    this.registry = options.registry ?? globalFontRegistry;
    this.download = options.download ?? downloadFont;
  }

  /** Never rejects: the worst case is the built-in family. */
  async resolve(sizePx: number): Promise<FontHandle> {
    if (!this.loading) {
      this.loading = this.loadFamily();
    }
    const family = await this.loading;
    const quoted = family === FALLBACK_FONT_FAMILY ? family : `"${family}"`;
    return { family, sizePx, css: `${sizePx}px ${quoted}` };
  }

  private async loadFamily(): Promise<string> {
    const localPath = await this.findLocalFont();
    if (localPath && this.register(localPath)) {
      return PANEL_FONT_FAMILY;
    }

    if (this.fontUrl) {
      try {
        if (!(await fileExists(this.cachePath))) {
          const data = await this.download(this.fontUrl);
          await mkdir(dirname(this.cachePath), { recursive: true });
          await writeFile(this.cachePath, data);
        }
        if (this.register(this.cachePath)) {
          return PANEL_FONT_FAMILY;
        }
      } catch (error) {
        logger.warn('Font download failed, falling back to built-in font', {
          url: this.fontUrl,
          error: describeError(error)
        });
      }
    }

    logger.warn('Using built-in fallback font; CJK glyphs may not render', {
      family: FALLBACK_FONT_FAMILY
    });
    return FALLBACK_FONT_FAMILY;
  }

  private async findLocalFont(): Promise<string | undefined> {
    const paths = this.fontPath ? [this.fontPath, ...this.candidates] : this.candidates;
    for (const path of paths) {
      if (await fileExists(path)) {
        return path;
      }
    }
    return undefined;
  }

  private register(path: string): boolean {
    try {
      if (this.registry.registerFromPath(path, PANEL_FONT_FAMILY)) {
        logger.info('Registered panel font', { path });
        return true;
      }
      logger.warn('Font file could not be parsed', { path });
    } catch (error) {
      logger.warn('Font registration failed', { path, error: describeError(error) });
    }
    return false;
  }
}
