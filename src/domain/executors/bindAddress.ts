// Bind address parsing and matching

import { BindAddress } from '../types/process';
import { SupervisorError } from '../errors/supervisorError';

const WILDCARD_HOSTS = new Set(['0.0.0.0', '*', '::']);
const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '::1']);

export function isWildcardHost(host: string): boolean {
  return WILDCARD_HOSTS.has(host);
}

function sameHost(a: string, b: string): boolean {
  return a === b || (LOOPBACK_HOSTS.has(a) && LOOPBACK_HOSTS.has(b));
}

/**
 * Parse "host:port", "[v6]:port" or a bare port (host defaults to 127.0.0.1)
 */
export function parseBindAddress(value: string): BindAddress {
  const trimmed = value.trim();
  let host = '127.0.0.1';
  let portText = trimmed;

  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(trimmed);
  if (bracketed) {
    host = bracketed[1];
    portText = bracketed[2];
  } else if (trimmed.includes(':')) {
    const separator = trimmed.lastIndexOf(':');
    host = trimmed.slice(0, separator);
    portText = trimmed.slice(separator + 1);
  }

  if (!host || !/^\d+$/.test(portText)) {
    throw new SupervisorError('INVALID_CONFIG', `Invalid bind address: '${value}' (expected host:port)`);
  }
  const port = parseInt(portText, 10);
  if (port < 1 || port > 65535) {
    throw new SupervisorError('INVALID_CONFIG', `Invalid bind address: '${value}' (port out of range)`);
  }
  return { host, port };
}

export function formatBindAddress(address: BindAddress): string {
  return address.host.includes(':') ? `[${address.host}]:${address.port}` : `${address.host}:${address.port}`;
}

/**
 * True when a socket bound at `local` (as the OS reports it) occupies `target`.
 * A wildcard on either side matches every host on the same port.
 */
export function occupiesAddress(local: string, target: BindAddress): boolean {
  let parsed: BindAddress;
  try {
    parsed = parseBindAddress(local);
  } catch {
    return false;
  }
  if (parsed.port !== target.port) return false;
  return isWildcardHost(parsed.host) || isWildcardHost(target.host) || sameHost(parsed.host, target.host);
}
