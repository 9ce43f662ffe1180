/**
 * One-shot notices carried across a redirect.
 *
 * The messages ride in a cookie whose value is `<base64url JSON>.<HMAC>`,
 * signed with the configured secret key. The next page that renders reads
 * and clears it. A cookie whose signature does not verify is dropped.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { Request, Response } from 'express';

export type FlashLevel = 'success' | 'error';

export interface FlashMessage {
  level: FlashLevel;
  message: string;
}

export const FLASH_COOKIE = 'flash';

function isFlashMessage(value: unknown): value is FlashMessage {
  if (typeof value !== 'object' || value === null) return false;
  if (!('level' in value) || !('message' in value)) return false;
  return (value.level === 'success' || value.level === 'error') && typeof value.message === 'string';
}

/** Read one cookie from the raw Cookie header. Values are returned as sent, without URI decoding. */
export function readCookie(header: string | undefined, name: string): string | undefined {
  if (!header) return undefined;
  for (const part of header.split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    if (part.slice(0, eq).trim() === name) {
      return part.slice(eq + 1).trim();
    }
  }
  return undefined;
}

export class FlashCookie {
  constructor(private readonly secret: string) {}

  encode(messages: readonly FlashMessage[]): string {
    const payload = Buffer.from(JSON.stringify(messages), 'utf8').toString('base64url');
    return `${payload}.${this.sign(payload)}`;
  }

  /** Verified messages from a cookie value; empty for missing, forged or malformed values. */
  decode(value: string | undefined): FlashMessage[] {
    if (!value) return [];
    const dot = value.lastIndexOf('.');
    if (dot === -1) return [];
    const payload = value.slice(0, dot);
    const given = Buffer.from(value.slice(dot + 1), 'utf8');
    const expected = Buffer.from(this.sign(payload), 'utf8');
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    } catch {
      return [];
    }
    return Array.isArray(parsed) ? parsed.filter(isFlashMessage) : [];
  }

  /** Queue notices for the next rendered page. */
  push(res: Response, ...messages: FlashMessage[]): void {
    res.cookie(FLASH_COOKIE, this.encode(messages), { httpOnly: true, sameSite: 'lax', path: '/' });
  }

  /** Take queued notices and clear the cookie. */
  consume(req: Request, res: Response): FlashMessage[] {
    const raw = readCookie(req.headers.cookie, FLASH_COOKIE);
    if (raw === undefined) return [];
    res.clearCookie(FLASH_COOKIE, { path: '/' });
    return this.decode(raw);
  }

  private sign(payload: string): string {
    return createHmac('sha256', this.secret).update(payload).digest('base64url');
  }
}
