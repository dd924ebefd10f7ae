import * as crypto from 'crypto';
import * as cheerio from 'cheerio';
import { HttpClient } from '../utils/http';
import { createDebug } from '../utils/log';
import { uniq } from '../utils/text';
import { parseVariantPlaylist } from '../streams/hls';
import { parseManifest } from '../streams/hds';
import { StreamVariant } from '../streams/types';

const dbg = createDebug('[iPlayer][MS]');

const ATK_SECRET = Buffer.from('N2RmZjc2NzFkMGM2OTdmZWRiMWQ5MDVkOWExMjE3MTk5MzhiOTJiZg==', 'base64');
const API_BASE = 'http://open.live.bbc.co.uk/mediaselector/5/select/version/2.0';

// queried in this order, both of them every time
export const PLATFORMS = ['pc', 'iptv-all'] as const;
export type Platform = typeof PLATFORMS[number];

export interface MediaSelection {
  hls: string[];
  hds: string[];
  errors: string[];
}

export function hashVpid(vpid: string): string {
  return crypto
    .createHash('sha1')
    .update(Buffer.concat([ATK_SECRET, Buffer.from(vpid, 'utf8')]))
    .digest('hex');
}

export function mediaSelectorUrl(platform: Platform, vpid: string): string {
  return `${API_BASE}/mediaset/${platform}/vpid/${vpid}/atk/${hashVpid(vpid)}/asn/1/`;
}

/**
 * Collects connection hrefs of video media by transfer format. Element names
 * are matched without namespaces.
 */
export function parseMediaSelection(xml: string): MediaSelection {
  const $ = cheerio.load(xml, { xml: true });
  const hls: string[] = [];
  const hds: string[] = [];

  $('media')
    .filter((_, el) => $(el).attr('kind') === 'video')
    .find('connection')
    .each((_, el) => {
      const $c = $(el);
      const href = $c.attr('href');
      if (!href) return;
      const format = $c.attr('transferFormat');
      if (format === 'hls') hls.push(href);
      else if (format === 'hds') hds.push(href);
    });

  const errors = $('error')
    .toArray()
    .map((el) => $(el).attr('id') || 'unknown');

  return { hls: uniq(hls), hds: uniq(hds), errors };
}

export async function* queryMediaSelector(http: HttpClient, vpid: string): AsyncGenerator<StreamVariant> {
  for (const platform of PLATFORMS) {
    const url = mediaSelectorUrl(platform, vpid);
    dbg('Querying', platform, url);
    const res = await http.get(url);
    const selection = parseMediaSelection(res.body);
    for (const err of selection.errors) {
      console.warn(`[iPlayer] Media selector returned an error for platform ${platform}: ${err}`);
    }
    dbg(platform, 'hls:', selection.hls.length, 'hds:', selection.hds.length);

    for (const surl of selection.hls) {
      const variants = await parseVariantPlaylist(http, surl);
      for (const [name, stream] of variants) yield { name, stream };
    }
    for (const surl of selection.hds) {
      const variants = await parseManifest(http, surl);
      for (const [name, stream] of variants) yield { name, stream };
    }
  }
}
