import { FACEBOOK_SELECTORS } from "./selectors";

const FACEBOOK_HOSTS = new Set(["facebook.com", "www.facebook.com", "m.facebook.com", "web.facebook.com"]);

/** Top-level paths that are site sections, never a username. */
const RESERVED_PATHS = new Set([
  "groups",
  "pages",
  "events",
  "watch",
  "marketplace",
  "login",
  "home.php",
  "profile.php",
  "people",
  "photo",
  "photo.php",
  "story.php",
  "permalink.php",
  "share",
  "hashtag",
  "gaming",
  "settings",
]);

/**
 * Canonical profile id from a profile URL: the `id` query parameter of
 * `profile.php`, otherwise the first path segment. `null` for anything else.
 */
export function extractFacebookId(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") return null;
  if (!FACEBOOK_HOSTS.has(parsed.hostname.toLowerCase())) return null;

  const segments = parsed.pathname.split("/").filter((s) => s.length > 0);
  const first = segments[0];
  if (!first) return null;

  if (first === "profile.php") {
    const id = parsed.searchParams.get("id");
    return id && /^\d+$/.test(id) ? id : null;
  }

  if (RESERVED_PATHS.has(first.toLowerCase())) return null;
  return /^[A-Za-z0-9.]+$/.test(first) ? first : null;
}

export function profileUrlForId(facebookId: string): string {
  if (/^\d+$/.test(facebookId)) {
    return `${FACEBOOK_SELECTORS.PROFILE_BY_ID_URL}${facebookId}`;
  }
  return `${FACEBOOK_SELECTORS.HOME_URL}${facebookId}`;
}

/** Graph timestamps use `+0000` offsets; returns unix seconds or null. */
export function graphTimeToUnix(value: string | undefined): number | null {
  if (!value) return null;
  const normalized = value.replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
}

export function groupUrlForId(externalGroupId: string): string {
  return `${FACEBOOK_SELECTORS.GROUP_URL_PREFIX}${externalGroupId}`;
}

/** Graph ids of group posts look like `<groupId>_<postId>`; the trailing segment is the post id. */
export function postIdFromGraphId(graphId: string): string {
  const parts = graphId.split("_");
  return parts[parts.length - 1] ?? graphId;
}
