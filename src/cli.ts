#!/usr/bin/env node
import { IPlayerExtractor } from './extractors/iplayer';

export function formatVariantLine(name: string, url: string): string {
  return `${name}\t${url}`;
}

export async function main(argv: string[]): Promise<number> {
  const url = argv[0];
  if (!url) {
    console.error('usage: iplayer-streams <episode or live URL>');
    return 2;
  }
  const extractor = new IPlayerExtractor();
  if (!extractor.supports(url)) {
    console.error('[iPlayer] Unsupported URL:', url);
    return 1;
  }
  const { streams } = await extractor.extract(url);
  for (const s of streams) process.stdout.write(formatVariantLine(s.name, s.stream.url) + '\n');
  return streams.length ? 0 : 1;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => { process.exitCode = code; })
    .catch((e: unknown) => {
      console.error('[iPlayer] Failed:', e instanceof Error ? e.message : e);
      process.exitCode = 1;
    });
}
