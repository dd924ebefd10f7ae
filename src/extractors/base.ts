import type { HttpClient } from '../utils/http';
import type { StreamVariant } from '../streams/types';

export interface ExtractorContext {
  username?: string;
  password?: string;
  /** Overrides the extractor's own client for this call */
  http?: HttpClient;
}

export interface ExtractResult {
  streams: StreamVariant[];
}

export interface HostExtractor {
  id: string;
  supports(url: string): boolean;
  streams(url: string, ctx?: ExtractorContext): AsyncGenerator<StreamVariant>;
  extract(url: string, ctx?: ExtractorContext): Promise<ExtractResult>;
}
