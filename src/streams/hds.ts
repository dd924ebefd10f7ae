import * as cheerio from 'cheerio';
import { HttpClient } from '../utils/http';
import { createDebug } from '../utils/log';
import { bitrateLabel, claimStreamName, pixelsLabel } from '../utils/streamNames';
import { HdsStream } from './types';

const dbg = createDebug('[HDS]');

// set-level manifests point at stream-level ones, which never nest further
const MAX_MANIFEST_DEPTH = 1;

export interface ManifestMedia {
  url?: string;
  href?: string;
  bitrate?: number;
  height?: number;
  streamId?: string;
  bootstrapInfoId?: string;
  drm: boolean;
}

export interface F4mManifest {
  baseUrl?: string;
  media: ManifestMedia[];
}

const toInt = (raw: string | undefined): number | undefined => {
  const n = parseInt(raw || '', 10);
  return Number.isFinite(n) ? n : undefined;
};

export function parseF4m(xml: string): F4mManifest {
  const $ = cheerio.load(xml, { xml: true });
  const baseUrl = $('baseURL').first().text().trim();
  const media: ManifestMedia[] = $('media').toArray().map((el) => {
    const $m = $(el);
    return {
      url: $m.attr('url'),
      href: $m.attr('href'),
      bitrate: toInt($m.attr('bitrate')),
      height: toInt($m.attr('height')),
      streamId: $m.attr('streamId'),
      bootstrapInfoId: $m.attr('bootstrapInfoId'),
      drm: $m.attr('drmAdditionalHeaderId') !== undefined,
    };
  });
  return { baseUrl: baseUrl || undefined, media };
}

function directoryOf(url: string): string {
  const u = new URL(url);
  u.search = '';
  u.hash = '';
  u.pathname = u.pathname.replace(/[^/]*$/, '');
  return u.toString();
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

function qualityLabel(media: ManifestMedia): string | undefined {
  return pixelsLabel(media.height) || bitrateLabel(media.bitrate ? media.bitrate * 1000 : undefined);
}

export async function parseManifest(http: HttpClient, url: string, depth = 0): Promise<Map<string, HdsStream>> {
  dbg('Fetching manifest', url);
  const res = await http.get(url);
  const manifestUrl = res.url || url;
  const manifest = parseF4m(res.body);
  const base = withTrailingSlash(manifest.baseUrl || directoryOf(manifestUrl));

  const streams = new Map<string, HdsStream>();
  for (const media of manifest.media) {
    if (media.drm) {
      console.warn('[HDS] Skipping DRM protected media in', url);
      continue;
    }

    if (media.url) {
      const label = qualityLabel(media) || media.streamId || 'live';
      const name = claimStreamName(label, streams);
      if (!name) continue;
      streams.set(name, {
        type: 'hds',
        url: new URL(media.url, base).toString(),
        manifestUrl: url,
        bitrate: media.bitrate,
        bootstrapInfoId: media.bootstrapInfoId,
      });
    } else if (media.href) {
      if (depth >= MAX_MANIFEST_DEPTH) {
        dbg('Not following nested manifest', media.href);
        continue;
      }
      const child = await parseManifest(http, new URL(media.href, base).toString(), depth + 1);
      // a lone child stream takes the quality the set-level entry advertises
      const parentLabel = qualityLabel(media);
      if (child.size === 1 && parentLabel) {
        const name = claimStreamName(parentLabel, streams);
        for (const stream of child.values()) if (name) streams.set(name, stream);
        continue;
      }
      for (const [childName, stream] of child) {
        const name = claimStreamName(childName, streams);
        if (name) streams.set(name, stream);
      }
    }
  }
  return streams;
}
