export interface Resolution {
  width: number;
  height: number;
}

export interface HlsStream {
  type: 'hls';
  /** Media playlist of this variant */
  url: string;
  /** Variant playlist the entry was read from */
  masterUrl: string;
  bandwidth?: number;
  resolution?: Resolution;
  codecs?: string;
}

export interface HdsStream {
  type: 'hds';
  /** Media URL, resolved against the manifest base */
  url: string;
  manifestUrl: string;
  bitrate?: number;
  bootstrapInfoId?: string;
}

export type StreamHandle = HlsStream | HdsStream;

export interface StreamVariant {
  name: string;
  stream: StreamHandle;
}
