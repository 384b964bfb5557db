import { loadImage, type Image } from '@napi-rs/canvas';
import axios from 'axios';

import { describeError, logger } from '../utils/logger.js';

export interface ImageSource {
  fetch(url: string): Promise<Image | null>;
}

const IMAGE_TIMEOUT_MS = 15_000;

export class ImageClient implements ImageSource {
  constructor(private readonly timeoutMs = IMAGE_TIMEOUT_MS) {}

  async fetch(url: string): Promise<Image | null> {
    if (!url) {
      return null;
    }

    try {
      const { data } = await axios.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
        headers: { 'User-Agent': 'Mozilla/5.0' }
      });
      return await loadImage(Buffer.from(data));
    } catch (error) {
      logger.warn('Image fetch failed, rendering without it', {
        url,
        error: this.extractErrorMessage(error)
      });
      return null;
    }
  }

  private extractErrorMessage(error: unknown): string {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      return status ? `${status} ${error.message}` : error.message;
    }
    return describeError(error);
  }
}
