/** Separator between Cache-Control directives and between Vary fields */
export const DIRECTIVE_DELIMITER = /\s*,\s*/;

/**
 * Parse a numeric directive value. Returns undefined for non-finite
 * or negative values so callers can safely treat undefined as "absent".
 */
function parseSeconds(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim().replace(/^"(.*)"$/, '$1');
  if (!/^\d+$/.test(trimmed)) return undefined;
  const n = Number.parseInt(trimmed, 10);
  return Number.isFinite(n) ? n : undefined;
}

function splitDirective(part: string): [string, string | undefined] {
  const eqIdx = part.indexOf('=');
  const key = (eqIdx === -1 ? part : part.slice(0, eqIdx)).trim().toLowerCase();
  const value = eqIdx === -1 ? undefined : part.slice(eqIdx + 1).trim();
  return [key, value];
}

/**
 * Seconds from the `max-age` directive, or undefined when the header or the
 * directive is missing or malformed.
 */
export function getMaxAge(header: string | null | undefined): number | undefined {
  if (!header) return undefined;

  let maxAge: number | undefined;
  for (const part of header.split(DIRECTIVE_DELIMITER)) {
    if (!part.trim()) continue;
    const [key, value] = splitDirective(part);
    if (key === 'max-age') {
      maxAge = parseSeconds(value);
    }
  }
  return maxAge;
}

/**
 * Set `max-age` on an existing Cache-Control value, keeping every other
 * directive and its position. An existing smaller `max-age` wins.
 */
export function mergeMaxAge(
  header: string | null | undefined,
  maxAge: number,
): string {
  const parts = header
    ? header
        .trim()
        .split(DIRECTIVE_DELIMITER)
        .filter((part) => part.length > 0)
    : [];

  let found = false;
  const merged = parts.map((part) => {
    const [key, value] = splitDirective(part);
    if (key !== 'max-age') return part;
    found = true;
    const current = parseSeconds(value);
    return `max-age=${current === undefined ? maxAge : Math.min(current, maxAge)}`;
  });

  if (!found) merged.push(`max-age=${maxAge}`);
  return merged.join(', ');
}
