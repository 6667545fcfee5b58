import type { Response } from 'express';

/**
 * HTTP response utilities
 * Consistent header setting and response helpers
 */

/**
 * Set no-cache headers (HTTP/1.0 and HTTP/1.1 compatible)
 * Use for conversion results and downloads
 */
export const setNoStore = (res: Response): void => {
  res.setHeader('Cache-Control', 'no-store');
  res.setHeader('Pragma', 'no-cache');
};

export const setPublicCache = (res: Response, maxAgeSec: number): void => {
  res.setHeader('Cache-Control', `public, max-age=${Math.max(0, Math.floor(maxAgeSec))}`);
};

/**
 * Set download headers with RFC 5987 filename* encoding for Unicode support
 */
export const setDownloadHeaders = (
  res: Response,
  filename: string,
  size?: number
): void => {
  // RFC 5987: filename* with UTF-8 encoding for better Unicode support
  const asciiSafe = filename.replace(/[^\x20-\x7E]/g, '_').replace(/"/g, '_'); // ASCII fallback
  const utf8Encoded = encodeURIComponent(filename);
  res.setHeader('Content-Disposition', `attachment; filename="${asciiSafe}"; filename*=UTF-8''${utf8Encoded}`);

  if (size !== undefined) {
    res.setHeader('Content-Length', String(size));
  }
  setNoStore(res);
};
