import { HttpClient, HttpResponse } from '../utils/http';
import { decodeJson } from '../utils/decode';
import { createDebug } from '../utils/log';
import { searchText } from '../utils/text';
import { accountLocalsSchema, idctaConfigSchema } from '../schemas/iplayer';

const dbg = createDebug('[iPlayer][AUTH]');

export const CONFIG_URL = 'http://www.bbc.co.uk/idcta/config';
export const AUTH_URL = 'https://account.bbc.com/signin';
export const DEFAULT_AUTH_CONTEXT = 'tvandiplayer';

const ACCOUNT_LOCALS_RE = /window\.bbcAccount\.locals\s*=\s*(\{.*?});/;

export interface Credentials {
  username: string;
  password: string;
}

export type AuthFailureReason = 'invalid-config' | 'nonce-missing' | 'invalid-locals' | 'redirect-mismatch';

export type AuthResult =
  | { ok: true; page: HttpResponse }
  | { ok: false; reason: AuthFailureReason };

/**
 * Signs in to the BBC account service. The account service redirects back to
 * `targetUrl` only when the credentials were accepted, so that redirect is the
 * success signal; the page it lands on is handed back for reuse.
 */
export async function authenticate(
  http: HttpClient,
  targetUrl: string,
  credentials: Credentials,
  context: string = DEFAULT_AUTH_CONTEXT,
): Promise<AuthResult> {
  const configRes = await http.get(CONFIG_URL, { params: { ptrt: targetUrl } });
  const config = decodeJson(idctaConfigSchema, configRes.body);
  if (!config.ok) {
    console.error('[iPlayer][AUTH] Unexpected site configuration:', config.error);
    return { ok: false, reason: 'invalid-config' };
  }
  dbg('Sign-in URL', config.value.signin_url);

  const signinRes = await http.get(config.value.signin_url, {
    params: { userOrigin: context, context },
    headers: { Referer: targetUrl },
  });
  const localsJson = searchText(signinRes.body, ACCOUNT_LOCALS_RE);
  if (localsJson === undefined) {
    console.error('[iPlayer][AUTH] Could not authenticate, could not find the authentication nonce');
    return { ok: false, reason: 'nonce-missing' };
  }
  const locals = decodeJson(accountLocalsSchema, localsJson);
  if (!locals.ok) {
    console.error('[iPlayer][AUTH] Unexpected account data on sign-in page:', locals.error);
    return { ok: false, reason: 'invalid-locals' };
  }

  const { userOrigin, nonce, ptrt } = locals.value;
  const res = await http.post(
    AUTH_URL,
    {
      jsEnabled: 'false',
      attempts: 0,
      username: credentials.username,
      password: credentials.password,
    },
    { params: { context: userOrigin, ptrt: ptrt.value, userOrigin, nonce } },
  );

  if (res.url !== targetUrl) {
    dbg('Login landed on', res.url);
    return { ok: false, reason: 'redirect-mismatch' };
  }
  return { ok: true, page: res };
}
