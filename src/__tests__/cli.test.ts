import { formatVariantLine, main } from '../cli';

describe('cli', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prints usage without a URL', async () => {
    await expect(main([])).resolves.toBe(2);
    expect(console.error).toHaveBeenCalledWith('usage: iplayer-streams <episode or live URL>');
  });

  it('rejects URLs outside iPlayer before any request', async () => {
    await expect(main(['https://www.example.test/watch/1'])).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith('[iPlayer] Unsupported URL:', 'https://www.example.test/watch/1');
  });

  it('formats one variant per line', () => {
    expect(formatVariantLine('720p', 'https://vod.example.test/hi.m3u8')).toBe('720p\thttps://vod.example.test/hi.m3u8');
  });
});
