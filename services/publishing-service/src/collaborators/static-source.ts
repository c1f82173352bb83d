import type { ContentItem } from "../items";
import type { Source } from "./types";

export class StaticSource implements Source {
  constructor(private readonly items: ContentItem[]) {}

  *discover(): Iterable<ContentItem> {
    yield* this.items;
  }
}
