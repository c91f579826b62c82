/**
 * Knowledge Retrieval API - Preview Link Signing
 *
 * Segment text may embed links to uploaded files. Before content leaves the
 * service each preview link gets a timestamp, a nonce and an HMAC signature
 * that the file server verifies.
 */

import { createHmac, randomBytes } from "crypto";

const PREVIEW_LINK_PATTERN = /\/files\/([a-f0-9-]+)\/(image-preview|file-preview)/g;

export type ContentSigner = (text: string) => string;

export interface ContentSignerOptions {
  /** Unix seconds */
  now?: () => number;
  nonce?: () => string;
}

/** URL-safe base64 that keeps its '=' padding */
function urlSafeBase64(buf: Buffer): string {
  return buf.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

export function signPreviewLink(secretKey: string, kind: string, fileId: string, timestamp: number, nonce: string): string {
  const payload = `${kind}|${fileId}|${timestamp}|${nonce}`;
  return urlSafeBase64(createHmac('sha256', secretKey).update(payload).digest());
}

export function createContentSigner(secretKey: string, options: ContentSignerOptions = {}): ContentSigner {
  const now = options.now ?? (() => Math.floor(Date.now() / 1000));
  const nonce = options.nonce ?? (() => randomBytes(16).toString('hex'));

  return (text: string) =>
    text.replace(PREVIEW_LINK_PATTERN, (link: string, fileId: string, kind: string) => {
      const timestamp = now();
      const n = nonce();
      const sign = signPreviewLink(secretKey, kind, fileId, timestamp, n);
      return `${link}?timestamp=${timestamp}&nonce=${n}&sign=${sign}`;
    });
}
