import { PoolNodeError } from '@poolnode/core';

export interface NetAddress {
  host: string;
  port: number;
}

const LOCAL_HOSTS = new Set(['', 'localhost', '127.0.0.1', '::1', '0.0.0.0', '::']);

/**
 * Parse `host:port` (IPv6 hosts in brackets).
 *
 * Listen specs may leave the host empty (all interfaces) and use port 0;
 * dial targets may not.
 */
export function parseNetAddress(address: string, opts: { listen?: boolean } = {}): NetAddress {
  const invalid = (reason: string) =>
    new PoolNodeError('INVALID_ADDRESS', {
      message: `Invalid address '${address}': ${reason}`,
      details: { address },
    });

  const sep = address.lastIndexOf(':');
  if (sep < 0) throw invalid('expected host:port');

  let host = address.slice(0, sep);
  const portText = address.slice(sep + 1);

  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  } else if (host.includes(':')) {
    throw invalid('IPv6 hosts must be bracketed');
  }

  if (!/^\d{1,5}$/.test(portText)) throw invalid('port must be numeric');
  const port = Number(portText);
  const minPort = opts.listen ? 0 : 1;
  if (port < minPort || port > 65535) throw invalid('port out of range');

  if (!opts.listen && host.length === 0) throw invalid('host is required');
  if (/\s/.test(host)) throw invalid('host contains whitespace');

  return { host, port };
}

export function formatNetAddress({ host, port }: NetAddress): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

export function isLocalHost(host: string): boolean {
  return LOCAL_HOSTS.has(host);
}
