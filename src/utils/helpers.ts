import crypto from 'crypto';
import type { TargetAddress } from '../types/remote';
import { TimeoutError } from './errors';

export interface AesKeyset {
  key: Buffer;
  iv: Buffer;
}

/** AES-256 key and CBC initialization vector, fresh on every call. */
export function generateAesKeyset(): AesKeyset {
  return {
    key: crypto.randomBytes(32),
    iv: crypto.randomBytes(16)
  };
}

export function withTimeout<T>(promise: Promise<T>, timeout: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeout)), timeout);
  });

  return Promise.race([promise, expired]).finally(() => clearTimeout(timer));
}

/** Parses `host:port`; IPv6 hosts are written in brackets, `[::1]:8123`. */
export function parseTarget(target: string): TargetAddress {
  const separator = target.lastIndexOf(':');
  if (separator <= 0) {
    throw new Error(`Target "${target}" has no port`);
  }

  let host = target.slice(0, separator);
  const portStr = target.slice(separator + 1);
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  } else if (host.includes(':')) {
    throw new Error(`IPv6 target "${target}" must put the address in brackets`);
  }

  const port = Number(portStr);
  if (!host || !/^\d+$/.test(portStr) || port < 1 || port > 65535) {
    throw new Error(`Target "${target}" has no valid host and port`);
  }
  return { host, port };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
