import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const { isValidImageUrl, fetchImageAsBase64 } = await import('../../src/utils/image.js');

const mockFetch = vi.fn<(url: string, init: RequestInit) => Promise<Response>>();

describe('isValidImageUrl', () => {
  it('should accept HTTPS URLs', () => {
    expect(isValidImageUrl('https://img.example.com/a.png')).toBe(true);
  });

  it('should reject other protocols and garbage', () => {
    expect(isValidImageUrl('http://img.example.com/a.png')).toBe(false);
    expect(isValidImageUrl('file:///etc/passwd')).toBe(false);
    expect(isValidImageUrl('not a url')).toBe(false);
  });
});

describe('fetchImageAsBase64', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return base64 content and media type', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(new Uint8Array([104, 101, 108, 108, 111]), {
        status: 200,
        headers: { 'content-type': 'image/png; charset=binary' },
      })
    );

    await expect(fetchImageAsBase64('https://img.example.com/a.png')).resolves.toEqual({
      data: 'aGVsbG8=',
      mediaType: 'image/png',
    });
  });

  it('should refuse non-HTTPS URLs without fetching', async () => {
    await expect(fetchImageAsBase64('http://img.example.com/a.png')).rejects.toThrow(
      'Invalid image URL. Must be HTTPS.'
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should reject HTTP errors', async () => {
    mockFetch.mockResolvedValueOnce(new Response('', { status: 404 }));

    await expect(fetchImageAsBase64('https://img.example.com/a.png')).rejects.toThrow(
      'Failed to fetch image: HTTP 404'
    );
  });

  it('should reject non-image content', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('<html></html>', { status: 200, headers: { 'content-type': 'text/html' } })
    );

    await expect(fetchImageAsBase64('https://img.example.com/a.png')).rejects.toThrow(
      'Invalid image content type: text/html. Supported: JPEG, PNG, GIF, WebP'
    );
  });

  it('should reject images over the size limit', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('x', {
        status: 200,
        headers: { 'content-type': 'image/jpeg', 'content-length': String(6 * 1024 * 1024) },
      })
    );

    await expect(fetchImageAsBase64('https://img.example.com/a.jpg')).rejects.toThrow(
      'Image too large: 6291456 bytes (max: 5242880)'
    );
  });
});
