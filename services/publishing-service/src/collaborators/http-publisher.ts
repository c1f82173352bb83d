import { z } from "zod";
import type { ContentItem } from "../items";
import { composePostText } from "../publisher/compose";
import type { PostFraming } from "../publisher/compose";
import type { PublishAttemptResult, PublishCapability } from "../publisher/types";

const postResponseSchema = z.object({
  postRef: z.string().optional()
});

// Client errors worth retrying: request timeout and rate limiting.
const retryableClientStatuses = new Set([408, 429]);

const errorResponseSchema = z.object({
  message: z.string().optional(),
  snapshotRef: z.string().optional()
});

async function readJson(response: Response): Promise<unknown> {
  return response.json().catch(() => ({}));
}

/**
 * Talks to the publishing worker that drives the target site. 4xx answers are
 * permanent except 408 and 429; 5xx answers and network failures are
 * transient. Any 2xx is a published post, with or without a JSON body.
 */
export class HttpPublishCapability implements PublishCapability {
  private readonly snapshots = new Map<string, string>();

  constructor(
    private readonly baseUrl: string,
    private readonly framing: PostFraming
  ) {}

  async publish(item: ContentItem, text: string): Promise<PublishAttemptResult> {
    const response = await fetch(`${this.baseUrl}/v1/posts`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        itemKey: item.key,
        title: item.title,
        text: composePostText(item, text, this.framing)
      })
    });

    if (response.ok) {
      this.snapshots.delete(item.key);
      const parsed = postResponseSchema.safeParse(await readJson(response));
      return { status: "OK", postRef: parsed.success ? parsed.data.postRef ?? null : null };
    }

    const body = errorResponseSchema.safeParse(await readJson(response));
    const details: z.infer<typeof errorResponseSchema> = body.success ? body.data : {};
    if (details.snapshotRef) {
      this.snapshots.set(item.key, details.snapshotRef);
    }
    const error = details.message ?? `Publisher responded with ${response.status}`;
    if (response.status >= 400 && response.status < 500 && !retryableClientStatuses.has(response.status)) {
      return { status: "PERMANENT_ERROR", error };
    }
    return { status: "TRANSIENT_ERROR", error };
  }

  async captureDiagnostic(item: ContentItem): Promise<string | null> {
    const snapshotRef = this.snapshots.get(item.key) ?? null;
    this.snapshots.delete(item.key);
    return snapshotRef;
  }
}
