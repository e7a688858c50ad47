import { hostname } from 'os';

export type HostnameProvider = () => string;

// Equivalent of `hostname -s`: everything before the first dot
export function shortHostname(read: HostnameProvider = hostname): string {
  const full = read().trim();
  const dot = full.indexOf('.');
  return dot === -1 ? full : full.slice(0, dot);
}
