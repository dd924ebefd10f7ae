import { ExtractorContext, ExtractResult, HostExtractor } from './base';
import { authenticate, Credentials } from './iplayerAuth';
import { queryMediaSelector } from './mediaselector';
import { getSettings, IPlayerSettings } from '../config/settings';
import { AxiosHttpClient, createAxiosClient, HttpClient, HttpResponse } from '../utils/http';
import { createDebug } from '../utils/log';
import { searchText } from '../utils/text';
import { StreamVariant } from '../streams/types';

const PORTAL_URL_RE = /^https?:\/\/(?:www\.)?bbc\.co\.uk\/iplayer\/(?:episode\/(\w+)|live\/(\w+))/i;
const VPID_RE = /"ident_id"\s*:\s*"(\w+)"/;
const TVIP_RE = /event_master_brand=(\w+?)&/;

export type PortalTarget =
  | { kind: 'episode'; episodeId: string }
  | { kind: 'live'; channelName: string };

export function matchPortalUrl(url: string): PortalTarget | null {
  const m = PORTAL_URL_RE.exec(url);
  if (!m) return null;
  if (m[1]) return { kind: 'episode', episodeId: m[1] };
  if (m[2]) return { kind: 'live', channelName: m[2] };
  return null;
}

export interface IPlayerExtractorOptions {
  http?: HttpClient;
  settings?: IPlayerSettings;
}

export class IPlayerExtractor implements HostExtractor {
  id = 'bbciplayer';
  private readonly http: HttpClient;
  private readonly settings: IPlayerSettings;
  private readonly dbg = createDebug('[iPlayer]', () => this.settings.debug);

  constructor(opts: IPlayerExtractorOptions = {}) {
    this.settings = opts.settings || getSettings();
    this.http = opts.http || new AxiosHttpClient(createAxiosClient(this.settings));
  }

  supports(url: string): boolean {
    return matchPortalUrl(url) !== null;
  }

  async findVpid(url: string, page?: HttpResponse, http: HttpClient = this.http): Promise<string | undefined> {
    this.dbg('Looking for vpid on', url);
    // a page already fetched by the login is reused
    const res = page || (await http.get(url));
    return searchText(res.body, VPID_RE);
  }

  async findTvip(url: string, http: HttpClient = this.http): Promise<string | undefined> {
    this.dbg('Looking for tvip on', url);
    const res = await http.get(url);
    return searchText(res.body, TVIP_RE);
  }

  async *streams(url: string, ctx: ExtractorContext = {}): AsyncGenerator<StreamVariant> {
    const target = matchPortalUrl(url);
    if (!target) {
      console.error('[iPlayer] Unsupported URL:', url);
      return;
    }
    const http = ctx.http || this.http;

    console.info('[iPlayer] A TV Licence is required to watch BBC iPlayer streams, see https://www.bbc.co.uk/iplayer/help/tvlicence');

    let page: HttpResponse | undefined;
    const credentials = this.credentialsFor(ctx);
    if (credentials) {
      const auth = await authenticate(http, url, credentials);
      if (!auth.ok) {
        console.error('[iPlayer] Could not authenticate, check your username and password', `(${auth.reason})`);
        return;
      }
      page = auth.page;
    }

    if (target.kind === 'episode') {
      this.dbg('Loading streams for episode', target.episodeId);
      const vpid = await this.findVpid(url, page, http);
      if (!vpid) {
        console.error(`[iPlayer] Could not find VPID for episode ${target.episodeId}`);
        return;
      }
      this.dbg('Found VPID', vpid);
      yield* queryMediaSelector(http, vpid);
    } else {
      this.dbg('Loading stream for live channel', target.channelName);
      const tvip = await this.findTvip(url, http);
      if (!tvip) return;
      this.dbg('Found TVIP', tvip);
      yield* queryMediaSelector(http, tvip);
    }
  }

  async extract(url: string, ctx: ExtractorContext = {}): Promise<ExtractResult> {
    const streams: StreamVariant[] = [];
    for await (const s of this.streams(url, ctx)) streams.push(s);
    console.log('[iPlayer] streams=', streams.length, 'url=', url);
    return { streams };
  }

  private credentialsFor(ctx: ExtractorContext): Credentials | null {
    // both halves come from the same source
    if (ctx.username) return { username: ctx.username, password: ctx.password ?? '' };
    if (!this.settings.username) return null;
    return { username: this.settings.username, password: this.settings.password ?? '' };
  }
}

export default IPlayerExtractor;
