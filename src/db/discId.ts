/**
 * Disc identifiers used by the player database.
 *
 * Discs are known by their MusicBrainz disc ID, a 28 character variant of base64
 * (`.` `_` `-` in place of `+` `/` `=`). The database stores each disc under the
 * lower-case hex form of the same 20 bytes, bucketed by its first hex digit.
 */

const DISC_ID_TO_BASE64: Record<string, string> = { '.': '+', _: '/', '-': '=' };
const BASE64_TO_DISC_ID: Record<string, string> = { '+': '.', '/': '_', '=': '-' };

const VALID_DB_ID_RE = /^[0-9a-fA-F]{40}$/;
const VALID_DISC_ID_RE = /^[0-9A-Za-z._]{27}-$/;

export function isValidDbId(dbId: string): boolean {
  return VALID_DB_ID_RE.test(dbId);
}

export function isValidDiscId(discId: string): boolean {
  if (!VALID_DISC_ID_RE.test(discId)) return false;
  return Buffer.from(toBase64(discId), 'base64').length === 20;
}

/** Translate a MusicBrainz disc ID to database format. */
export function discToDbId(discId: string): string {
  if (!isValidDiscId(discId)) throw new Error(`invalid disc ID: ${discId}`);
  return Buffer.from(toBase64(discId), 'base64').toString('hex');
}

/** Translate a database ID to a MusicBrainz disc ID. */
export function dbToDiscId(dbId: string): string {
  if (!isValidDbId(dbId)) throw new Error(`invalid DB ID: ${dbId}`);
  const base64 = Buffer.from(dbId, 'hex').toString('base64');
  return base64.replace(/[+/=]/g, (c) => BASE64_TO_DISC_ID[c]);
}

export function bucketForDbId(dbId: string): string {
  return dbId.charAt(0).toLowerCase();
}

export function filenameBase(dbId: string): string {
  return dbId.slice(0, 8).toLowerCase();
}

function toBase64(discId: string): string {
  return discId.replace(/[._-]/g, (c) => DISC_ID_TO_BASE64[c]);
}
