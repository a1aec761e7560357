/**
 * Downloading provider-hosted images so they can be sent through the host
 */

import { logger } from './logger.js';

export type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

export interface FetchedImage {
  /** base64 content */
  data: string;
  mediaType: ImageMediaType;
}

/**
 * Maximum image size in bytes (5MB)
 */
const MAX_IMAGE_SIZE = 5 * 1024 * 1024;

const FETCH_TIMEOUT = 30_000;

const CONTENT_TYPE_MAP: Record<string, ImageMediaType> = {
  'image/jpeg': 'image/jpeg',
  'image/jpg': 'image/jpeg',
  'image/png': 'image/png',
  'image/gif': 'image/gif',
  'image/webp': 'image/webp',
};

/**
 * Only HTTPS URLs with a hostname are fetched
 */
export function isValidImageUrl(url: string): boolean {
  try {
    const parsed = new URL(url);

    if (parsed.protocol !== 'https:') {
      logger.debug('Image URL rejected: not HTTPS', { url });
      return false;
    }

    if (!parsed.hostname || parsed.hostname.length === 0) {
      logger.debug('Image URL rejected: no hostname', { url });
      return false;
    }

    return true;
  } catch {
    logger.debug('Image URL rejected: invalid URL format', { url });
    return false;
  }
}

/**
 * Fetch an image and return it as base64
 *
 * HTTPS only, at most 5MB, 30s timeout, image content types only.
 *
 * @throws Error if the fetch or any check fails
 */
export async function fetchImageAsBase64(url: string): Promise<FetchedImage> {
  if (!isValidImageUrl(url)) {
    throw new Error('Invalid image URL. Must be HTTPS.');
  }

  logger.debug('Fetching image', { url });

  const controller = new AbortController();
  const timeoutId = setTimeout(() => { controller.abort(); }, FETCH_TIMEOUT);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': 'wechat-bot-plugins/1.0',
      },
    });

    if (!response.ok) {
      throw new Error(`Failed to fetch image: HTTP ${String(response.status)}`);
    }

    const contentTypeHeader = response.headers.get('content-type');
    const rawContentType = contentTypeHeader?.split(';')[0]?.toLowerCase();
    const mediaType = rawContentType ? CONTENT_TYPE_MAP[rawContentType] : undefined;
    if (!mediaType) {
      throw new Error(
        `Invalid image content type: ${rawContentType ?? 'unknown'}. ` +
          'Supported: JPEG, PNG, GIF, WebP'
      );
    }

    const contentLength = response.headers.get('content-length');
    if (contentLength && parseInt(contentLength, 10) > MAX_IMAGE_SIZE) {
      throw new Error(`Image too large: ${contentLength} bytes (max: ${String(MAX_IMAGE_SIZE)})`);
    }

    const arrayBuffer = await response.arrayBuffer();

    if (arrayBuffer.byteLength > MAX_IMAGE_SIZE) {
      throw new Error(
        `Image too large: ${String(arrayBuffer.byteLength)} bytes (max: ${String(MAX_IMAGE_SIZE)})`
      );
    }

    logger.debug('Image fetched successfully', {
      url,
      size: arrayBuffer.byteLength,
      mediaType,
    });

    return {
      data: Buffer.from(arrayBuffer).toString('base64'),
      mediaType,
    };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error(`Image fetch timed out after ${String(FETCH_TIMEOUT / 1000)} seconds`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
