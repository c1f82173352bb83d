import type { ContentItem } from "../items";
import type { Source } from "./types";

/**
 * Collects items announced by an upstream discovery service. Each pass drains
 * what has arrived since the previous one; a key announced twice before a
 * pass is offered once.
 */
export class QueuedSource implements Source {
  private readonly pending = new Map<string, ContentItem>();

  offer(item: ContentItem): void {
    if (!this.pending.has(item.key)) {
      this.pending.set(item.key, item);
    }
  }

  size(): number {
    return this.pending.size;
  }

  discover(): Iterable<ContentItem> {
    const items = Array.from(this.pending.values());
    this.pending.clear();
    return items;
  }
}
