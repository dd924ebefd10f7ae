import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { wrapper } from 'axios-cookiejar-support';
import { CookieJar } from 'tough-cookie';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { createCookieAgent } from 'http-cookie-agent/http';
import { getSettings, IPlayerSettings } from '../config/settings';

export type QueryParams = Record<string, string | number>;

export interface RequestOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  /** Final URL, after redirects */
  url: string;
  status: number;
  body: string;
}

/**
 * The only transport the extractor talks to. Non-2xx statuses and network
 * failures reject.
 */
export interface HttpClient {
  get(url: string, opts?: RequestOptions): Promise<HttpResponse>;
  post(url: string, form: QueryParams, opts?: RequestOptions): Promise<HttpResponse>;
}

// Proxy agent that reads and writes the jar on every hop, redirects included
const HttpsProxyCookieAgent = createCookieAgent(HttpsProxyAgent);

export function createProxyCookieAgent(proxy: string, jar: CookieJar): HttpsProxyAgent<string> {
  const agentOptions = { keepAlive: true, cookies: { jar } };
  return new HttpsProxyCookieAgent(proxy, agentOptions);
}

export function createAxiosClient(settings: IPlayerSettings, jar: CookieJar = new CookieJar()): AxiosInstance {
  const proxyAgent = settings.proxy ? createProxyCookieAgent(settings.proxy, jar) : undefined;

  const instance = axios.create({
    jar,
    ...(proxyAgent ? { httpAgent: proxyAgent, httpsAgent: proxyAgent } : {}),
    proxy: false,
    timeout: settings.timeoutMs,
    responseType: 'text',
    headers: {
      'User-Agent': settings.userAgent,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-GB,en;q=0.9',
    },
  });

  // axios-cookiejar-support refuses custom agents; the proxy agent already carries the jar
  return proxyAgent ? instance : wrapper(instance);
}

function finalUrlOf(res: AxiosResponse<string>, fallback: string): string {
  // follow-redirects exposes the last hop on the node response
  const req: unknown = res.request;
  if (typeof req === 'object' && req !== null && 'res' in req) {
    const inner: unknown = req.res;
    if (typeof inner === 'object' && inner !== null && 'responseUrl' in inner && typeof inner.responseUrl === 'string') {
      return inner.responseUrl;
    }
  }
  return fallback;
}

export class AxiosHttpClient implements HttpClient {
  constructor(private readonly client: AxiosInstance = createAxiosClient(getSettings())) {}

  async get(url: string, opts: RequestOptions = {}): Promise<HttpResponse> {
    const res = await this.client.get<string>(url, { params: opts.params, headers: opts.headers });
    return this.toResponse(res);
  }

  async post(url: string, form: QueryParams, opts: RequestOptions = {}): Promise<HttpResponse> {
    const body = new URLSearchParams();
    for (const [k, v] of Object.entries(form)) body.append(k, String(v));
    const res = await this.client.post<string>(url, body.toString(), {
      params: opts.params,
      headers: { ...opts.headers, 'Content-Type': 'application/x-www-form-urlencoded' },
    });
    return this.toResponse(res);
  }

  private toResponse(res: AxiosResponse<string>): HttpResponse {
    return {
      url: finalUrlOf(res, this.client.getUri(res.config)),
      status: res.status,
      body: typeof res.data === 'string' ? res.data : '',
    };
  }
}
