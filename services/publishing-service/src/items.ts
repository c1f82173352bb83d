export type ContentItem = {
  /** Stable identity, usually the canonical source URL. */
  key: string;
  title: string;
  source: string;
  contentRef: string;
  discoveredAt: Date;
};
