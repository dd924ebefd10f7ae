import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT, isTruthyFlag, loadSettings } from '../settings';

describe('loadSettings', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({
      username: undefined,
      password: undefined,
      proxy: undefined,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      userAgent: DEFAULT_USER_AGENT,
      debug: false,
    });
  });

  it('reads credentials, proxy and timeout', () => {
    const settings = loadSettings({
      IPLAYER_USERNAME: '  test-user ',
      IPLAYER_PASSWORD: ' test-secret ',
      PROXY: 'http://proxy.example.test:3128',
      IPLAYER_TIMEOUT_MS: '7500',
      IPLAYER_DEBUG: 'on',
    });

    expect(settings.username).toBe('test-user');
    expect(settings.password).toBe(' test-secret ');
    expect(settings.proxy).toBe('http://proxy.example.test:3128');
    expect(settings.timeoutMs).toBe(7500);
    expect(settings.debug).toBe(true);
  });

  it('ignores an unusable timeout', () => {
    expect(loadSettings({ IPLAYER_TIMEOUT_MS: 'soon' }).timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(loadSettings({ IPLAYER_TIMEOUT_MS: '-5' }).timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
  });

  it('accepts the usual truthy spellings', () => {
    expect(['1', 'true', 'ON', 'yes'].map(isTruthyFlag)).toEqual([true, true, true, true]);
    expect(['0', 'off', '', undefined].map(isTruthyFlag)).toEqual([false, false, false, false]);
  });
});
