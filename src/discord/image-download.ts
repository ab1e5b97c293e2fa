import net from 'node:net';
import sharp from 'sharp';
import type { ImageData } from '../runtime/types.js';

/** Allowed Discord CDN hosts for attachments (SSRF protection). */
const ATTACHMENT_HOSTS = new Set(['cdn.discordapp.com', 'media.discordapp.net']);

/** Max bytes per individual image (20 MB). */
export const MAX_IMAGE_BYTES = 20 * 1024 * 1024;

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 30_000;

/** Types the model accepts as-is. */
const PASSTHROUGH_MEDIA_TYPES = new Set(['image/png', 'image/jpeg', 'image/webp']);

/** Types converted to PNG before sending. */
const CONVERTED_MEDIA_TYPES = new Set(['image/gif']);

const EXT_TO_MIME: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
};

const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/g;
const IMAGE_URL_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.webp', '.bmp'];

/** Discord attachment shape (subset of discord.js Attachment). */
export type AttachmentLike = {
  url: string;
  name?: string | null;
  contentType?: string | null;
  size?: number | null;
};

export type DownloadOutcome = { ok: true; image: ImageData } | { ok: false; error: string };

export type DownloadOptions = {
  timeoutMs?: number;
};

function normalizeMime(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const mime = (raw.split(';')[0] ?? '').trim().toLowerCase();
  if (mime === 'image/jpg') return 'image/jpeg';
  return mime || null;
}

function isSupported(mime: string): boolean {
  return PASSTHROUGH_MEDIA_TYPES.has(mime) || CONVERTED_MEDIA_TYPES.has(mime);
}

/**
 * Resolve a Discord attachment's MIME type from its contentType or filename extension.
 * Returns null if the attachment is not a supported image format.
 */
export function resolveMediaType(attachment: AttachmentLike): string | null {
  const reported = normalizeMime(attachment.contentType);
  if (reported && isSupported(reported)) return reported;

  const name = attachment.name ?? '';
  const dotIdx = name.lastIndexOf('.');
  if (dotIdx >= 0) {
    const mime = EXT_TO_MIME[name.slice(dotIdx + 1).toLowerCase()];
    if (mime) return mime;
  }

  return null;
}

/** Sanitize an attachment filename for error messages (no URLs or query params). */
export function safeName(attachment: AttachmentLike): string {
  const raw = attachment.name ?? 'unknown';
  return raw.replace(/[\x00-\x1f]/g, '').slice(0, 100).trim() || 'unknown';
}

/** Image links in message text, in order of appearance, at most `maxUrls`. */
export function extractImageUrls(text: string, maxUrls: number): string[] {
  if (maxUrls <= 0) return [];
  const urls = text.match(URL_PATTERN) ?? [];
  return urls
    .filter((url) => {
      const lc = url.toLowerCase();
      return IMAGE_URL_EXTENSIONS.some((ext) => lc.endsWith(ext));
    })
    .slice(0, maxUrls);
}

// Loopback, private, link-local and carrier-grade NAT ranges. IPv4-mapped
// IPv6 addresses are refused outright; the URL parser rewrites them to hex.
const PRIVATE_RANGES = new net.BlockList();
for (const [network, prefix] of [
  ['0.0.0.0', 8],
  ['10.0.0.0', 8],
  ['100.64.0.0', 10],
  ['127.0.0.0', 8],
  ['169.254.0.0', 16],
  ['172.16.0.0', 12],
  ['192.168.0.0', 16],
] as const) {
  PRIVATE_RANGES.addSubnet(network, prefix, 'ipv4');
}
for (const [network, prefix] of [
  ['::', 128],
  ['::1', 128],
  ['::ffff:0:0', 96],
  ['fc00::', 7],
  ['fe80::', 10],
] as const) {
  PRIVATE_RANGES.addSubnet(network, prefix, 'ipv6');
}

export function isPrivateIp(value: string): boolean {
  const host = value.replace(/^\[|\]$/g, '').toLowerCase();
  const ipType = net.isIP(host);
  if (ipType === 4) return PRIVATE_RANGES.check(host, 'ipv4');
  if (ipType === 6) return PRIVATE_RANGES.check(host, 'ipv6');
  return false;
}

export function isBlockedHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  if (!host) return true;
  if (host === 'localhost' || host.endsWith('.localhost') || host.endsWith('.local')) return true;
  return isPrivateIp(host);
}

function tooLarge(name: string, bytes: number): string {
  const sizeMB = (bytes / (1024 * 1024)).toFixed(1);
  return `${name}: too large (${sizeMB} MB, max 20 MB)`;
}

/** GIFs become a PNG of their first frame. */
export async function toModelImage(buffer: Buffer, mediaType: string): Promise<ImageData> {
  if (CONVERTED_MEDIA_TYPES.has(mediaType)) {
    const png = await sharp(buffer).png().toBuffer();
    return { base64: png.toString('base64'), mediaType: 'image/png' };
  }
  return { base64: buffer.toString('base64'), mediaType };
}

async function fetchImage(
  url: string,
  name: string,
  expectedType: string | null,
  timeoutMs: number,
): Promise<DownloadOutcome> {
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      redirect: 'error',
    });

    if (!response.ok) {
      return { ok: false, error: `${name}: HTTP ${response.status}` };
    }

    const declared = Number(response.headers.get('content-length') ?? '');
    if (Number.isFinite(declared) && declared > MAX_IMAGE_BYTES) {
      return { ok: false, error: tooLarge(name, declared) };
    }

    // The served type wins over the name; a non-image response is rejected.
    const served = normalizeMime(response.headers.get('content-type'));
    let mediaType = expectedType;
    if (served && served.startsWith('image/')) {
      mediaType = served;
    } else if (served && served !== 'application/octet-stream') {
      return { ok: false, error: `${name}: not an image (${served})` };
    }
    if (!mediaType || !isSupported(mediaType)) {
      return { ok: false, error: `${name}: unsupported image type${mediaType ? ` (${mediaType})` : ''}` };
    }

    const buffer = Buffer.from(await response.arrayBuffer());
    if (buffer.length > MAX_IMAGE_BYTES) {
      return { ok: false, error: tooLarge(name, buffer.length) };
    }

    return { ok: true, image: await toModelImage(buffer, mediaType) };
  } catch (err: unknown) {
    const errObj = err instanceof Error ? err : null;
    if (errObj?.name === 'TimeoutError' || errObj?.name === 'AbortError') {
      return { ok: false, error: `${name}: download timed out` };
    }
    if (errObj?.name === 'TypeError' && String(errObj.message).includes('redirect')) {
      return { ok: false, error: `${name}: blocked (unexpected redirect)` };
    }
    return { ok: false, error: `${name}: download failed` };
  }
}

/** Download a single Discord image attachment. */
export async function downloadAttachment(
  attachment: AttachmentLike,
  mediaType: string,
  opts: DownloadOptions = {},
): Promise<DownloadOutcome> {
  const name = safeName(attachment);

  let parsedUrl: URL;
  try {
    parsedUrl = new URL(attachment.url);
  } catch {
    return { ok: false, error: `${name}: invalid URL` };
  }

  if (parsedUrl.protocol !== 'https:' || !ATTACHMENT_HOSTS.has(parsedUrl.hostname)) {
    return { ok: false, error: `${name}: blocked (non-Discord CDN host)` };
  }

  // Pre-check size from Discord metadata.
  if (attachment.size != null && attachment.size > MAX_IMAGE_BYTES) {
    return { ok: false, error: tooLarge(name, attachment.size) };
  }

  return fetchImage(attachment.url, name, mediaType, opts.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS);
}

/** Download an image linked from message text. Any public host is accepted. */
export async function downloadImageUrl(url: string, opts: DownloadOptions = {}): Promise<DownloadOutcome> {
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch {
    return { ok: false, error: 'image link: invalid URL' };
  }
  const name = parsedUrl.pathname.split('/').pop() || parsedUrl.hostname;

  if (parsedUrl.protocol !== 'https:' && parsedUrl.protocol !== 'http:') {
    return { ok: false, error: `${name}: blocked (unsupported protocol)` };
  }
  if (isBlockedHost(parsedUrl.hostname)) {
    return { ok: false, error: `${name}: blocked (private host)` };
  }

  const dotIdx = name.lastIndexOf('.');
  const fromName = dotIdx >= 0 ? EXT_TO_MIME[name.slice(dotIdx + 1).toLowerCase()] ?? null : null;
  return fetchImage(url, name, fromName, opts.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS);
}
