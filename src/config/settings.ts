// Runtime settings, read from the environment once per process.
// Context values passed to the extractor override username/password.

export interface IPlayerSettings {
  username?: string;
  password?: string;
  proxy?: string;
  timeoutMs: number;
  userAgent: string;
  debug: boolean;
}

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:131.0) Gecko/20100101 Firefox/131.0';
export const DEFAULT_TIMEOUT_MS = 20000;

const nonEmpty = (v: string | undefined): string | undefined => {
  const t = (v || '').trim();
  return t ? t : undefined;
};

export function isTruthyFlag(raw: string | undefined): boolean {
  return /^(1|true|on|yes)$/i.test(String(raw || '').trim());
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): IPlayerSettings {
  const timeoutRaw = parseInt(env.IPLAYER_TIMEOUT_MS || '', 10);
  return {
    username: nonEmpty(env.IPLAYER_USERNAME),
    // taken verbatim, not trimmed
    password: env.IPLAYER_PASSWORD ? env.IPLAYER_PASSWORD : undefined,
    proxy: nonEmpty(env.PROXY),
    timeoutMs: Number.isFinite(timeoutRaw) && timeoutRaw > 0 ? timeoutRaw : DEFAULT_TIMEOUT_MS,
    userAgent: nonEmpty(env.IPLAYER_USER_AGENT) || DEFAULT_USER_AGENT,
    debug: isTruthyFlag(env.IPLAYER_DEBUG),
  };
}

let cached: IPlayerSettings | null = null;

export function getSettings(): IPlayerSettings {
  if (!cached) cached = loadSettings();
  return cached;
}
