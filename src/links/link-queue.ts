import pino from "pino";
import type { Value } from "../notation/values.js";

export interface LinkEntry {
  url: string;
  metadata: Record<string, Value>;
}

/** What a `$name` page entry fans out to: one page task per captured link. */
export interface TaskSeed {
  url: string;
  /** Bound as task variables */
  metadata: Record<string, Value>;
}

/**
 * Named groups of discovered links. Entries are deduplicated by
 * (group, normalized url) and the first capture wins: a later capture of the
 * same url keeps the original metadata. Groups only grow.
 */
export class LinkQueue {
  private groups = new Map<string, LinkEntry[]>();
  private seen = new Map<string, Set<string>>();
  private logger: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "trawl.links",
    });
  }

  /**
   * Record a link. Relative urls are resolved against `base` and fragments
   * are dropped. Returns true when a new entry was added.
   */
  capture(
    group: string,
    url: string,
    metadata: Record<string, Value> = {},
    base?: string,
  ): boolean {
    const normalized = normalizeUrl(url, base);
    if (normalized === null) {
      this.logger.debug({ group, url }, "Ignoring empty link");
      return false;
    }

    let seen = this.seen.get(group);
    let entries = this.groups.get(group);
    if (!seen || !entries) {
      seen = new Set();
      entries = [];
      this.seen.set(group, seen);
      this.groups.set(group, entries);
    }

    if (seen.has(normalized)) return false;

    seen.add(normalized);
    entries.push({ url: normalized, metadata: { ...metadata } });
    this.logger.debug({ group, url: normalized }, "Link captured");
    return true;
  }

  /**
   * Snapshot a group as task seeds, one per entry from position `from` on.
   * The seeds own copies of the metadata. Unknown or still-empty groups
   * yield an empty list.
   */
  resolveReference(name: string, from = 0): TaskSeed[] {
    const entries = this.groups.get(name) ?? [];
    return entries.slice(from).map((e) => ({ url: e.url, metadata: { ...e.metadata } }));
  }

  size(name: string): number {
    return this.groups.get(name)?.length ?? 0;
  }

  get groupNames(): string[] {
    return Array.from(this.groups.keys());
  }

  get totalCount(): number {
    let count = 0;
    for (const entries of this.groups.values()) count += entries.length;
    return count;
  }

  toJSON(): Record<string, LinkEntry[]> {
    const out: Record<string, LinkEntry[]> = {};
    for (const [name, entries] of this.groups) {
      out[name] = entries.map((e) => ({ url: e.url, metadata: { ...e.metadata } }));
    }
    return out;
  }
}

/**
 * Trim, resolve against `base` and drop the fragment. Urls that cannot be
 * parsed are kept as written (minus fragment). Empty input yields null.
 */
export function normalizeUrl(url: string, base?: string): string | null {
  const trimmed = url.trim();
  if (trimmed === "") return null;

  try {
    const parsed = base ? new URL(trimmed, base) : new URL(trimmed);
    parsed.hash = "";
    return parsed.href;
  } catch {
    const hash = trimmed.indexOf("#");
    const bare = hash >= 0 ? trimmed.slice(0, hash) : trimmed;
    return bare === "" ? null : bare;
  }
}
