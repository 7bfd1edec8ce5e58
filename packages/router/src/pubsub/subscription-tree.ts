import {
  formatPattern,
  parsePattern,
  parseTopic,
  type TopicPattern,
} from "@interconnect/protocol";
import { ValidationError } from "@interconnect/errors";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Subscription {
  readonly identity: string;
  /** Canonical pattern text */
  readonly pattern: string;
  readonly createdAt: number;
}

interface TrieNode {
  readonly children: Map<string, TrieNode>;
  /** Identities subscribed to exactly the path of this node */
  readonly exact: Set<string>;
  /** Identities subscribed to `<path of this node>/#` */
  readonly prefix: Set<string>;
}

function createNode(): TrieNode {
  return { children: new Map(), exact: new Set(), prefix: new Set() };
}

function isEmpty(node: TrieNode): boolean {
  return node.children.size === 0 && node.exact.size === 0 && node.prefix.size === 0;
}

function requirePattern(pattern: string): TopicPattern {
  const parsed = parsePattern(pattern);
  if (!parsed) {
    throw new ValidationError({
      code: "ROUTING_MALFORMED_ENVELOPE",
      message: `Invalid topic pattern "${pattern}"`,
    });
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// SubscriptionTree
// ---------------------------------------------------------------------------

/**
 * Topic-pattern trie keyed by path segment.
 *
 * `match` walks one branch, collecting prefix subscribers at each depth
 * below the topic's full length and exact subscribers at the full length,
 * so a lookup costs O(topic depth) regardless of subscriber count.
 */
export class SubscriptionTree {
  private readonly root: TrieNode = createNode();
  /** identity → pattern → subscription */
  private readonly byIdentity = new Map<string, Map<string, Subscription>>();
  private readonly now: () => number;
  private count = 0;

  constructor(now: () => number = () => Date.now()) {
    this.now = now;
  }

  /**
   * Add a subscription. Idempotent per (identity, pattern).
   * Returns false when the subscription already existed.
   * Throws ROUTING_MALFORMED_ENVELOPE for an invalid pattern.
   */
  subscribe(identity: string, pattern: string): boolean {
    const parsed = requirePattern(pattern);
    const key = formatPattern(parsed);
    let patterns = this.byIdentity.get(identity);
    if (patterns?.has(key)) return false;

    let node = this.root;
    for (const segment of parsed.segments) {
      let child = node.children.get(segment);
      if (!child) {
        child = createNode();
        node.children.set(segment, child);
      }
      node = child;
    }
    (parsed.prefix ? node.prefix : node.exact).add(identity);

    if (!patterns) {
      patterns = new Map();
      this.byIdentity.set(identity, patterns);
    }
    patterns.set(key, { identity, pattern: key, createdAt: this.now() });
    this.count++;
    return true;
  }

  /**
   * Remove a subscription. Returns false when it did not exist.
   */
  unsubscribe(identity: string, pattern: string): boolean {
    const parsed = requirePattern(pattern);
    const key = formatPattern(parsed);
    const patterns = this.byIdentity.get(identity);
    if (!patterns?.delete(key)) return false;
    if (patterns.size === 0) this.byIdentity.delete(identity);
    this.count--;

    // Walk down remembering the path so empty nodes can be pruned bottom-up
    const path: [parent: TrieNode, segment: string, child: TrieNode][] = [];
    let node = this.root;
    for (const segment of parsed.segments) {
      const child = node.children.get(segment);
      if (!child) return true;
      path.push([node, segment, child]);
      node = child;
    }
    (parsed.prefix ? node.prefix : node.exact).delete(identity);
    for (let i = path.length - 1; i >= 0; i--) {
      const entry = path[i];
      if (!entry) break;
      const [parent, segment, child] = entry;
      if (!isEmpty(child)) break;
      parent.children.delete(segment);
    }
    return true;
  }

  /**
   * Remove every subscription held by an identity.
   * Returns the patterns that were removed.
   */
  removeAll(identity: string): readonly string[] {
    const patterns = [...(this.byIdentity.get(identity)?.keys() ?? [])];
    for (const pattern of patterns) {
      this.unsubscribe(identity, pattern);
    }
    return patterns;
  }

  /**
   * Identities whose patterns match the topic.
   * Throws ROUTING_MALFORMED_ENVELOPE for an invalid topic.
   */
  match(topic: string): ReadonlySet<string> {
    const segments = parseTopic(topic);
    if (!segments) {
      throw new ValidationError({
        code: "ROUTING_MALFORMED_ENVELOPE",
        message: `Invalid topic "${topic}"`,
      });
    }

    const matched = new Set<string>();
    let node: TrieNode | undefined = this.root;
    for (let depth = 0; node; depth++) {
      if (depth < segments.length) {
        for (const identity of node.prefix) matched.add(identity);
        const segment = segments[depth];
        node = segment === undefined ? undefined : node.children.get(segment);
      } else {
        for (const identity of node.exact) matched.add(identity);
        node = undefined;
      }
    }
    return matched;
  }

  patternsOf(identity: string): readonly Subscription[] {
    return [...(this.byIdentity.get(identity)?.values() ?? [])];
  }

  /** Number of (identity, pattern) subscriptions */
  get size(): number {
    return this.count;
  }

  clear(): void {
    this.root.children.clear();
    this.root.exact.clear();
    this.root.prefix.clear();
    this.byIdentity.clear();
    this.count = 0;
  }
}
