import { z } from "zod";
import type { ContentItem } from "../items";
import { SummarizationError } from "./types";
import type { Summarizer } from "./types";

const summaryResponseSchema = z.object({
  summary: z.string()
});

export class HttpSummarizer implements Summarizer {
  constructor(private readonly baseUrl: string) {}

  async summarize(item: ContentItem): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1/summaries`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          key: item.key,
          title: item.title,
          source: item.source,
          contentRef: item.contentRef
        })
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SummarizationError(`Summarizer unreachable: ${reason}`, item.key);
    }

    if (!response.ok) {
      throw new SummarizationError(`Summarizer responded with ${response.status}`, item.key);
    }

    const parsed = summaryResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SummarizationError("Summarizer returned an unexpected payload", item.key);
    }
    const summary = parsed.data.summary.trim();
    if (summary.length === 0) {
      throw new SummarizationError("Summarizer returned an empty summary", item.key);
    }
    return summary;
  }
}
