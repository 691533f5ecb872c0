export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

/**
 * Cut `text` to `maxLength` characters, marking the cut with "...".
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function stripHtml(text: string): string {
  return text
    .replace(/<[^>]*>/g, '')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Derive an article title from its URL: the last path segment, decoded, with
 * underscores read as spaces. Returns undefined for URLs without a path.
 */
export function titleFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }
  const segment = pathname.split('/').filter((part) => part.length > 0).pop();
  if (!segment) {
    return undefined;
  }
  return decodeSegment(segment).replace(/_/g, ' ');
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function hostMatches(url: string, domain: string): boolean {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host === domain || host.endsWith(`.${domain}`);
  } catch {
    return false;
  }
}

/**
 * First label of a URL's host for hosts with at least three labels
 * (`fr` for `fr.wikipedia.org`). Undefined otherwise.
 */
export function hostLabel(url: string): string | undefined {
  let labels: string[];
  try {
    labels = new URL(url).hostname.toLowerCase().split('.');
  } catch {
    return undefined;
  }
  return labels.length >= 3 ? labels[0] : undefined;
}

export function today(): string {
  return new Date().toISOString().slice(0, 10);
}
