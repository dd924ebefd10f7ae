import { HttpClient } from '../utils/http';
import { createDebug } from '../utils/log';
import { bitrateLabel, claimStreamName, pixelsLabel } from '../utils/streamNames';
import { HlsStream, Resolution } from './types';

const dbg = createDebug('[HLS]');

export interface VariantEntry {
  uri: string;
  bandwidth?: number;
  resolution?: Resolution;
  codecs?: string;
}

// KEY=value, KEY="quoted, value"
const ATTRIBUTE_RE = /([A-Z0-9-]+)=("[^"]*"|[^,]*)/g;

export function parseAttributeList(raw: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  let m: RegExpExecArray | null;
  ATTRIBUTE_RE.lastIndex = 0;
  while ((m = ATTRIBUTE_RE.exec(raw)) !== null) {
    const value = m[2].trim();
    attrs[m[1]] = value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
  }
  return attrs;
}

function toAbsoluteUrl(uri: string, base: string): string {
  try {
    return new URL(uri, base).toString();
  } catch {
    return uri;
  }
}

/**
 * Reads the #EXT-X-STREAM-INF entries of a variant playlist. A media playlist
 * gives an empty list.
 */
export function parseMasterPlaylist(text: string, baseUrl: string): VariantEntry[] {
  const lines = text.split(/\r?\n/).map((l) => l.trim());
  if (!lines.some((l) => l.startsWith('#EXTM3U'))) return [];

  const variants: VariantEntry[] = [];
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.startsWith('#EXT-X-STREAM-INF:')) continue;

    // URI is the next line that is neither blank nor a tag
    let j = i + 1;
    while (j < lines.length && (!lines[j] || lines[j].startsWith('#'))) j++;
    if (j >= lines.length) break;

    const attrs = parseAttributeList(line.substring('#EXT-X-STREAM-INF:'.length));
    const entry: VariantEntry = { uri: toAbsoluteUrl(lines[j], baseUrl) };
    const bw = parseInt(attrs['BANDWIDTH'] || '', 10);
    if (Number.isFinite(bw)) entry.bandwidth = bw;
    const res = /^(\d+)x(\d+)$/i.exec(attrs['RESOLUTION'] || '');
    if (res) entry.resolution = { width: parseInt(res[1], 10), height: parseInt(res[2], 10) };
    if (attrs['CODECS']) entry.codecs = attrs['CODECS'];
    variants.push(entry);
    i = j;
  }
  return variants;
}

export function nameVariants(entries: VariantEntry[], masterUrl: string): Map<string, HlsStream> {
  const streams = new Map<string, HlsStream>();
  for (const entry of entries) {
    const label = pixelsLabel(entry.resolution?.height) || bitrateLabel(entry.bandwidth);
    if (!label) {
      dbg('Skipping unnamed variant', entry.uri);
      continue;
    }
    const name = claimStreamName(label, streams);
    if (!name) {
      dbg('Too many variants named', label);
      continue;
    }
    streams.set(name, {
      type: 'hls',
      url: entry.uri,
      masterUrl,
      bandwidth: entry.bandwidth,
      resolution: entry.resolution,
      codecs: entry.codecs,
    });
  }
  return streams;
}

export async function parseVariantPlaylist(http: HttpClient, url: string): Promise<Map<string, HlsStream>> {
  dbg('Fetching variant playlist', url);
  const res = await http.get(url);
  const base = res.url || url;
  const entries = parseMasterPlaylist(res.body, base);
  if (!entries.length) console.warn('[HLS] No variants in playlist', url);
  return nameVariants(entries, url);
}
