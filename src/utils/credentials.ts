import { readFileSync } from 'fs';
import { z } from 'zod';
import { CredentialBundle } from '../types/index.js';
import { CredentialError } from './errors.js';
import { Logger } from './logger.js';

/** `{ "cookie": "a=b; c=d" }`, a cookie header copied from the browser */
const CookieHeaderFileSchema = z.object({ cookie: z.string() });

/** `{ "a": "b", "c": "d" }`; values that are not strings or numbers are dropped */
const CookieMapFileSchema = z.record(z.unknown());

const CookieValueSchema = z.union([z.string(), z.number()]);

/**
 * Parses a raw `a=b; c=d` cookie header into a map.
 */
export function parseCookieString(cookie: string): Record<string, string> {
  const bundle: Record<string, string> = {};
  for (const part of cookie.split(';')) {
    const separator = part.indexOf('=');
    if (separator === -1) continue;
    const name = part.slice(0, separator).trim();
    if (!name) continue;
    bundle[name] = part.slice(separator + 1).trim();
  }
  return bundle;
}

/**
 * Normalizes the parsed cookie file:
 * `{ "cookie": "a=b; c=d" }` is parsed, a flat object of strings is taken as is,
 * anything else yields an empty bundle.
 */
export function normalizeCookieDocument(document: unknown): Record<string, string> {
  const header = CookieHeaderFileSchema.safeParse(document);
  if (header.success) {
    return parseCookieString(header.data.cookie);
  }

  const map = CookieMapFileSchema.safeParse(document);
  if (!map.success) return {};

  const bundle: Record<string, string> = {};
  for (const [name, value] of Object.entries(map.data)) {
    const parsed = CookieValueSchema.safeParse(value);
    if (parsed.success) {
      bundle[name] = String(parsed.data);
    }
  }
  return bundle;
}

export interface CredentialRequirements {
  required: readonly string[];
  recommended: readonly string[];
}

/**
 * Reads the credential bundle once per process.
 * Throws CredentialError when the file is missing, unreadable, empty or lacks a
 * required cookie. Missing recommended cookies are only logged.
 */
export function loadCredentials(
  cookieFile: string,
  requirements: CredentialRequirements,
  logger: Logger
): CredentialBundle {
  let raw: string;
  try {
    raw = readFileSync(cookieFile, 'utf-8');
  } catch (error) {
    throw new CredentialError(
      `Cookie file ${cookieFile} could not be read: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch {
    throw new CredentialError(`Cookie file ${cookieFile} is not valid JSON`);
  }

  const bundle = normalizeCookieDocument(document);
  if (Object.keys(bundle).length === 0) {
    throw new CredentialError(`Cookie file ${cookieFile} contains no cookies`);
  }

  const missingRequired = requirements.required.filter((name) => !(name in bundle));
  if (missingRequired.length > 0) {
    throw new CredentialError(`Cookie file ${cookieFile} is missing required cookies: ${missingRequired.join(', ')}`);
  }

  const missingRecommended = requirements.recommended.filter((name) => !(name in bundle));
  if (missingRecommended.length > 0) {
    logger.warn('Cookie bundle lacks recommended cookies, requests may be blocked', {
      missing: missingRecommended,
    });
  }

  logger.info('Loaded credentials', { cookieFile, cookieCount: Object.keys(bundle).length });
  return Object.freeze(bundle);
}
