import { Request, Response } from 'express';

export type FlashCategory = 'success' | 'error';

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

export const FLASH_COOKIE = 'flash';

function isFlashMessage(value: unknown): value is FlashMessage {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('category' in value) || !('message' in value)) {
    return false;
  }
  return (value.category === 'success' || value.category === 'error') && typeof value.message === 'string';
}

function pending(res: Response): FlashMessage[] {
  const queued: unknown = res.locals[FLASH_COOKIE];
  return Array.isArray(queued) ? queued.filter(isFlashMessage) : [];
}

/**
 * Queues a notice for the next rendered page. Notices travel in a signed
 * cookie, so cookie-parser must be installed with a secret.
 */
export function flash(res: Response, category: FlashCategory, message: string): void {
  const messages = [...pending(res), { category, message }];
  res.locals[FLASH_COOKIE] = messages;
  res.cookie(FLASH_COOKIE, messages, { signed: true, httpOnly: true, sameSite: 'lax' });
}

/** Returns the notices left by the previous response and clears them. */
export function takeFlash(req: Request, res: Response): FlashMessage[] {
  const stored: unknown = req.signedCookies?.[FLASH_COOKIE];
  if (stored === undefined) {
    return [];
  }
  res.clearCookie(FLASH_COOKIE);
  return Array.isArray(stored) ? stored.filter(isFlashMessage) : [];
}
