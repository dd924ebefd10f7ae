export { IPlayerExtractor, matchPortalUrl } from './extractors/iplayer';
export type { IPlayerExtractorOptions, PortalTarget } from './extractors/iplayer';
export { authenticate, AUTH_URL, CONFIG_URL, DEFAULT_AUTH_CONTEXT } from './extractors/iplayerAuth';
export type { AuthResult, AuthFailureReason, Credentials } from './extractors/iplayerAuth';
export { hashVpid, mediaSelectorUrl, parseMediaSelection, queryMediaSelector, PLATFORMS } from './extractors/mediaselector';
export type { MediaSelection, Platform } from './extractors/mediaselector';
export type { ExtractorContext, ExtractResult, HostExtractor } from './extractors/base';
export { parseVariantPlaylist, parseMasterPlaylist } from './streams/hls';
export { parseManifest, parseF4m } from './streams/hds';
export type { HdsStream, HlsStream, StreamHandle, StreamVariant } from './streams/types';
export { AxiosHttpClient, createAxiosClient } from './utils/http';
export type { HttpClient, HttpResponse, RequestOptions } from './utils/http';
export { loadSettings, getSettings } from './config/settings';
export type { IPlayerSettings } from './config/settings';
