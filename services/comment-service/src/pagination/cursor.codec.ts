export type CursorValue = Date | number | string;

export interface DecodedCursor {
  value: CursorValue;
  id: number;
}

type CursorTag = 'date' | 'number' | 'string';

/**
 * Encode the last-seen sort value and id into an opaque token.
 * Dates travel as ISO-8601 strings.
 */
export function encodeCursor(value: CursorValue, id: number): string {
  let tag: CursorTag;
  let raw: string | number;

  if (value instanceof Date) {
    tag = 'date';
    raw = value.toISOString();
  } else if (typeof value === 'number') {
    tag = 'number';
    raw = value;
  } else {
    tag = 'string';
    raw = value;
  }

  return Buffer.from(JSON.stringify({ t: tag, v: raw, id }), 'utf8').toString('base64url');
}

/**
 * Decode a cursor produced by encodeCursor.
 * Returns null for anything malformed so callers can restart from the first page.
 */
export function decodeCursor(cursor: string | null | undefined): DecodedCursor | null {
  const token = (cursor ?? '').trim();
  if (!token) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null) return null;
  if (!('t' in parsed) || !('v' in parsed) || !('id' in parsed)) return null;

  const { t, v, id } = parsed;
  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id < 1) return null;

  switch (t) {
    case 'date': {
      if (typeof v !== 'string') return null;
      const date = new Date(v);
      if (Number.isNaN(date.getTime())) return null;
      return { value: date, id };
    }
    case 'number':
      if (typeof v !== 'number' || !Number.isFinite(v)) return null;
      return { value: v, id };
    case 'string':
      if (typeof v !== 'string') return null;
      return { value: v, id };
    default:
      return null;
  }
}
