import { getSettings } from '../config/settings';

// Debug output is off unless IPLAYER_DEBUG=1|true|on, or the caller's own flag says so
export function createDebug(
  tag: string,
  enabled: () => boolean = () => getSettings().debug,
): (...args: unknown[]) => void {
  return (...args: unknown[]) => {
    if (enabled()) console.log(tag, ...args);
  };
}
