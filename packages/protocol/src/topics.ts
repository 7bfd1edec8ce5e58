// ---------------------------------------------------------------------------
// Topic syntax
// ---------------------------------------------------------------------------

export const TOPIC_SEPARATOR = "/";
export const PREFIX_WILDCARD = "#";

/**
 * A parsed subscription pattern.
 *
 * `devices/building1/#` parses to `{ segments: ["devices", "building1"], prefix: true }`
 * and matches every topic under `devices/building1/`. A pattern without the
 * trailing wildcard matches only the identical topic.
 */
export interface TopicPattern {
  readonly segments: readonly string[];
  readonly prefix: boolean;
}

/**
 * Split a topic into segments. Returns undefined when the topic is empty,
 * has an empty segment, or uses the reserved wildcard segment.
 */
export function parseTopic(topic: string): readonly string[] | undefined {
  if (topic.length === 0) return undefined;
  const segments = topic.split(TOPIC_SEPARATOR);
  for (const segment of segments) {
    if (segment.length === 0 || segment === PREFIX_WILDCARD) return undefined;
  }
  return segments;
}

export function parsePattern(pattern: string): TopicPattern | undefined {
  if (pattern === PREFIX_WILDCARD) {
    return { segments: [], prefix: true };
  }
  const suffix = `${TOPIC_SEPARATOR}${PREFIX_WILDCARD}`;
  if (pattern.endsWith(suffix)) {
    const segments = parseTopic(pattern.slice(0, -suffix.length));
    return segments ? { segments, prefix: true } : undefined;
  }
  const segments = parseTopic(pattern);
  return segments ? { segments, prefix: false } : undefined;
}

export function formatPattern(pattern: TopicPattern): string {
  if (!pattern.prefix) return pattern.segments.join(TOPIC_SEPARATOR);
  return [...pattern.segments, PREFIX_WILDCARD].join(TOPIC_SEPARATOR);
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

function startsWith(segments: readonly string[], prefix: readonly string[]): boolean {
  if (prefix.length > segments.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (segments[i] !== prefix[i]) return false;
  }
  return true;
}

/**
 * Whether a pattern matches a topic (given as segments).
 * A prefix pattern needs at least one segment beyond its prefix.
 */
export function patternMatches(pattern: TopicPattern, topic: readonly string[]): boolean {
  if (pattern.prefix) {
    return topic.length > pattern.segments.length && startsWith(topic, pattern.segments);
  }
  return topic.length === pattern.segments.length && startsWith(topic, pattern.segments);
}

/**
 * Whether every topic matched by `inner` is also matched by `outer`.
 * Used to decide if a capability pattern grants a requested pattern.
 */
export function patternCovers(outer: TopicPattern, inner: TopicPattern): boolean {
  if (!outer.prefix) {
    return (
      !inner.prefix &&
      inner.segments.length === outer.segments.length &&
      startsWith(inner.segments, outer.segments)
    );
  }
  const minLength = inner.prefix ? outer.segments.length : outer.segments.length + 1;
  return inner.segments.length >= minLength && startsWith(inner.segments, outer.segments);
}
