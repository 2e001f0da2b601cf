/**
 * NSID syntax
 *
 * An NSID is a reversed domain authority followed by a name segment,
 * e.g. `app.bsky.feed.post`. At least two segments, at most 317 characters.
 * Published atproto NSIDs have three or more.
 */

const DOMAIN_SEGMENT = /^[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?$/;
const NAME_SEGMENT = /^[a-zA-Z][a-zA-Z0-9]{0,62}$/;
const MAX_NSID_LENGTH = 317;

export const isValidNsid = (value: string): boolean => {
  if (value.length === 0 || value.length > MAX_NSID_LENGTH) {
    return false;
  }

  const segments = value.split(".");
  if (segments.length < 2) {
    return false;
  }

  const name = segments[segments.length - 1] ?? "";
  const authority = segments.slice(0, -1);
  return (
    NAME_SEGMENT.test(name) &&
    authority.every((segment) => DOMAIN_SEGMENT.test(segment)) &&
    // Top-level domain cannot start with a digit
    !/^[0-9]/.test(authority[0] ?? "")
  );
};

/**
 * Whether an nsid falls under a namespace prefix. The match is per segment:
 * `app.test` selects `app.test` and `app.test.post`, never `app.testing.post`.
 */
export const matchesNamespacePrefix = (
  nsid: string,
  prefix: string | undefined
): boolean => {
  if (prefix === undefined) return true;
  const normalized = prefix.endsWith(".") ? prefix.slice(0, -1) : prefix;
  if (normalized.length === 0) return true;
  return nsid === normalized || nsid.startsWith(`${normalized}.`);
};
