import crypto from 'crypto';

export const PLATFORM_ORIGIN = 'https://www.facebook.com';

const TRACKING_PARAMS = new Set([
  'ref', 'referral', 'source', 'fbclid', 'igshid', 'notif_id', 'notif_t',
  'utm_source', 'utm_medium', 'utm_campaign', 'utm_content', 'utm_term',
]);

export function collapseWhitespace(value: string): string {
  return value.replace(/[\u200B-\u200D\uFEFF]/g, '').replace(/\s+/g, ' ').trim();
}

// Comparison form: casing, width and whitespace differences vanish
export function normalizeContent(content: string): string {
  return collapseWhitespace(content.normalize('NFKC')).toLowerCase();
}

export function contentHash(content: string): string {
  return crypto.createHash('sha256').update(normalizeContent(content)).digest('hex');
}

export function absoluteUrl(href: string, origin: string = PLATFORM_ORIGIN): string {
  const trimmed = href.trim();
  if (!trimmed) return '';
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  try {
    return new URL(trimmed.replace(/^\.\//, '/'), origin).toString();
  } catch {
    return trimmed;
  }
}

// Strips tracking parameters (including the `__cft__[0]`, `__tn__` family) and fragments
export function canonicalUrl(href: string): string {
  const absolute = absoluteUrl(href);
  try {
    const u = new URL(absolute);
    for (const key of Array.from(u.searchParams.keys())) {
      if (key.startsWith('__') || TRACKING_PARAMS.has(key)) {
        u.searchParams.delete(key);
      }
    }
    u.hash = '';
    return u.toString();
  } catch {
    return absolute;
  }
}

// Outbound links are wrapped as l.php?u=<target>
export function unwrapRedirect(href: string): string {
  try {
    const u = new URL(absoluteUrl(href));
    if (/^l[m]?\.facebook\.com$/i.test(u.hostname) && u.pathname === '/l.php') {
      return u.searchParams.get('u') ?? href;
    }
    return u.toString();
  } catch {
    return href;
  }
}

export function authorIdFromUrl(profileUrl: string): string {
  if (!profileUrl) return '';
  try {
    const u = new URL(absoluteUrl(profileUrl));
    const id = u.searchParams.get('id');
    if (u.pathname.endsWith('/profile.php') && id) return id;

    const segments = u.pathname.split('/').filter(Boolean);
    const userIndex = segments.indexOf('user');
    if (segments[0] === 'groups' && userIndex !== -1 && segments[userIndex + 1]) {
      return segments[userIndex + 1];
    }
    if (segments[0] === 'people' && segments.length >= 3) {
      return segments[2];
    }
    return segments[segments.length - 1] ?? '';
  } catch {
    return '';
  }
}
