import type { ContentItem } from "../items";

export type PostFraming = {
  prefix: string;
  suffix: string;
};

export function composePostText(item: ContentItem, summary: string, framing: PostFraming): string {
  const parts = [framing.prefix.trim(), summary.trim(), `Read more: ${item.key}`, framing.suffix.trim()];
  return parts.filter((part) => part.length > 0).join("\n\n");
}
