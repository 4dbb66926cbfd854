import type { HostKey } from '../types/models.js';

/** Stable identity: `address:port:user`. */
export function formatHostKey(key: HostKey): string {
  return `${key.address}:${key.port}:${key.user}`;
}

/** Inverse of formatHostKey. Returns null for anything that isn't one. */
export function parseHostKey(value: string): HostKey | null {
  // Addresses may be IPv6 and contain colons; port and user are the last two segments.
  const userSep = value.lastIndexOf(':');
  if (userSep <= 0) return null;
  const portSep = value.lastIndexOf(':', userSep - 1);
  if (portSep <= 0) return null;

  const address = value.slice(0, portSep);
  const port = Number(value.slice(portSep + 1, userSep));
  const user = value.slice(userSep + 1);

  if (!user || !Number.isInteger(port) || port < 1 || port > 65535) return null;
  return { address, port, user };
}
