export const FACEBOOK_SELECTORS = {
  HOME_URL: "https://www.facebook.com/",
  LOGIN_URL: "https://www.facebook.com/login",
  GROUP_URL_PREFIX: "https://www.facebook.com/groups/",
  PROFILE_BY_ID_URL: "https://www.facebook.com/profile.php?id=",

  AUTH: {
    SESSION_COOKIE: "c_user",
    COOKIE_DOMAIN: ".facebook.com",
  },

  PROFILE: {
    NAME: ["h1"],
    BIO: ['[data-overviewsection="about"]', '[data-section="about"]', ".about", ".bio"],
    WORK: ['[data-overviewsection="work"]', ".work_experience", ".work"],
    EDUCATION: ['[data-overviewsection="education"]', ".education", ".school"],
    LOCATION: ['[data-overviewsection="places"]', ".location", ".hometown"],
    RELATIONSHIP: ['[data-overviewsection="relationship"]', ".relationship"],
    PICTURE: ['img[data-imgperflogname="profileCoverPhoto"]', ".profilePicThumb img"],
    POSTS: ['[data-testid="story-subtilte"]'],
    FRIENDS_COUNT: ['a[href*="friends"] span', ".friends-count"],
    VERIFIED_BADGE: ['[aria-label="Verified account"]', '[aria-label="Verified"]'],
  },
} as const;

/** Visible-text markers of a login wall or a blocked/missing profile. Compared case-insensitively. */
export const ACCESS_WALL_MARKERS = [
  "You must log in",
  "Log in to continue",
  "Create New Account",
  "This content isn't available",
  "This content isn't available right now",
  "not available",
  "You're temporarily blocked",
] as const;

export const LOGIN_FAILURE_URL_PATTERNS = [/\/checkpoint\//i, /\/disabled\//i, /\/login\/device-based\/regular\/login/i];

export const POSTS_SAMPLE_LIMIT = 5;
export const POSTS_SAMPLE_MIN_LENGTH = 10;
export const POSTS_SAMPLE_SEPARATOR = "\n---\n";
