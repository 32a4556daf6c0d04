const DATA_URL_PATTERN = /^data:(.*?)(;base64)?,(.*)$/s;

/**
 * Decode the payload of a `data:` URL. Returns `null` for anything that is
 * not a data URL or whose payload cannot be decoded.
 */
export function decodeDataUrl(value: string): string | null {
  const match = value.match(DATA_URL_PATTERN);
  if (!match) {
    return null;
  }
  const isBase64 = Boolean(match[2]);
  const payload = match[3] ?? '';
  try {
    if (isBase64) {
      const binary = atob(payload);
      const bytes = Uint8Array.from(binary, (char) => char.charCodeAt(0));
      return new TextDecoder('utf-8').decode(bytes);
    }
    return decodeURIComponent(payload);
  } catch {
    return null;
  }
}

/**
 * Turn a configured caption reference into SRT text.
 *
 * References are either `data:` URLs or the document itself. An undecodable
 * data URL resolves to `null` and the caption track stays silent.
 */
export function resolveCaptionDocument(ref: string | null | undefined): string | null {
  if (typeof ref !== 'string' || !ref.trim()) {
    return null;
  }
  if (ref.startsWith('data:')) {
    const decoded = decodeDataUrl(ref);
    if (decoded === null) {
      console.warn('Unable to decode caption data URL');
    }
    return decoded;
  }
  return ref;
}
