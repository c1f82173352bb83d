import { afterEach, describe, expect, test, vi } from "vitest";
import type { ApprovalRequest } from "../src/approvals/types";
import { HttpPublishCapability } from "../src/collaborators/http-publisher";
import { HttpSummarizer } from "../src/collaborators/http-summarizer";
import { KafkaNotifier } from "../src/collaborators/kafka-notifier";
import { QueuedSource } from "../src/collaborators/queued-source";
import { SummarizationError } from "../src/collaborators/types";
import { DecisionQueue } from "../src/events/decision-queue";
import { composePostText } from "../src/publisher/compose";
import { PublisherGateway } from "../src/publisher/gateway";
import { makeItem, silentLogger } from "./helpers";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function stubFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn();
  for (const response of responses) {
    if (response instanceof Error) {
      fetchMock.mockRejectedValueOnce(response);
    } else {
      fetchMock.mockResolvedValueOnce(response);
    }
  }
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpSummarizer", () => {
  const summarizer = new HttpSummarizer("http://summarizer.test");
  const item = makeItem("https://news.example/a");

  test("returns the trimmed summary", async () => {
    const fetchMock = stubFetch(jsonResponse({ summary: "  A short summary.  " }));

    expect(await summarizer.summarize(item)).toBe("A short summary.");
    expect(fetchMock).toHaveBeenCalledWith("http://summarizer.test/v1/summaries", expect.objectContaining({ method: "POST" }));
    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({
      key: "https://news.example/a",
      title: "Title https://news.example/a",
      source: "test-feed",
      contentRef: "ref:https://news.example/a"
    });
  });

  test("wraps every failure in a SummarizationError", async () => {
    stubFetch(
      new TypeError("fetch failed"),
      jsonResponse({ message: "overloaded" }, 503),
      jsonResponse({ text: "wrong shape" }),
      jsonResponse({ summary: "   " })
    );

    await expect(summarizer.summarize(item)).rejects.toThrow("Summarizer unreachable: fetch failed");
    await expect(summarizer.summarize(item)).rejects.toThrow("Summarizer responded with 503");
    await expect(summarizer.summarize(item)).rejects.toThrow("Summarizer returned an unexpected payload");
    await expect(summarizer.summarize(item)).rejects.toBeInstanceOf(SummarizationError);
  });
});

describe("HttpPublishCapability", () => {
  const item = makeItem("https://news.example/a");
  const capability = () => new HttpPublishCapability("http://publisher.test", { prefix: "New read:", suffix: "#news" });

  test("sends the composed post and returns the post reference", async () => {
    const fetchMock = stubFetch(jsonResponse({ postRef: "urn:post:1" }, 201));

    expect(await capability().publish(item, "Worth a look.")).toEqual({ status: "OK", postRef: "urn:post:1" });
    expect(fetchMock.mock.calls[0][0]).toBe("http://publisher.test/v1/posts");
    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({
      itemKey: "https://news.example/a",
      title: "Title https://news.example/a",
      text: "New read:\n\nWorth a look.\n\nRead more: https://news.example/a\n\n#news"
    });
  });

  test("treats client errors as permanent and keeps the snapshot for diagnostics", async () => {
    stubFetch(jsonResponse({ message: "Post too long", snapshotRef: "snap-1" }, 422));
    const publisher = capability();

    expect(await publisher.publish(item, "text")).toEqual({ status: "PERMANENT_ERROR", error: "Post too long" });
    expect(await publisher.captureDiagnostic(item)).toBe("snap-1");
    expect(await publisher.captureDiagnostic(item)).toBeNull();
  });

  test("treats a success without a JSON body as published", async () => {
    stubFetch(new Response(null, { status: 204 }), new Response("created", { status: 200 }));
    const publisher = capability();

    expect(await publisher.publish(item, "text")).toEqual({ status: "OK", postRef: null });
    expect(await publisher.publish(item, "text")).toEqual({ status: "OK", postRef: null });
  });

  test("a bodiless success is posted exactly once through the gateway", async () => {
    const fetchMock = stubFetch(new Response(null, { status: 204 }));
    const gateway = new PublisherGateway({
      capability: capability(),
      policy: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100 },
      logger: silentLogger,
      sleep: async () => undefined
    });

    expect(await gateway.publish(item, "text")).toEqual({ status: "PUBLISHED", attempts: 1, postRef: null });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test("retries request timeouts and rate limiting", async () => {
    stubFetch(jsonResponse({ message: "Slow down" }, 429), new Response(null, { status: 408 }));
    const publisher = capability();

    expect(await publisher.publish(item, "text")).toEqual({ status: "TRANSIENT_ERROR", error: "Slow down" });
    expect(await publisher.publish(item, "text")).toEqual({
      status: "TRANSIENT_ERROR",
      error: "Publisher responded with 408"
    });
  });

  test("treats server errors as transient", async () => {
    stubFetch(new Response("upstream exploded", { status: 502 }));

    expect(await capability().publish(item, "text")).toEqual({
      status: "TRANSIENT_ERROR",
      error: "Publisher responded with 502"
    });
  });
});

describe("KafkaNotifier", () => {
  const request: ApprovalRequest = {
    id: "req-1",
    itemKey: "https://news.example/a",
    item: makeItem("https://news.example/a"),
    summary: "Worth a look.",
    state: "PENDING",
    ttlMs: 1000,
    createdAt: new Date(0),
    expiresAt: new Date(1000)
  };

  test("publishes approval notices keyed by item", async () => {
    const producer = { send: vi.fn().mockResolvedValue([]) };
    const notifier = new KafkaNotifier(producer, new DecisionQueue(), "publishing-service");

    const deliveryId = await notifier.send(request);

    const [{ topic, messages }] = producer.send.mock.calls[0];
    expect(topic).toBe("approval.requested");
    expect(messages[0].key).toBe("https://news.example/a");
    const event = JSON.parse(messages[0].value);
    expect(event.id).toBe(deliveryId);
    expect(event.traceId).toBe("req-1");
    expect(event.data).toEqual({
      requestId: "req-1",
      itemKey: "https://news.example/a",
      title: "Title https://news.example/a",
      source: "test-feed",
      summary: "Worth a look.",
      state: "PENDING",
      expiresAt: "1970-01-01T00:00:01.000Z"
    });
  });

  test("reports publish failures", async () => {
    const producer = { send: vi.fn().mockResolvedValue([]) };
    const notifier = new KafkaNotifier(producer, new DecisionQueue(), "publishing-service");

    await notifier.notifyFailure(request.item, {
      requestId: "req-1",
      attempts: 3,
      lastError: "editor did not load",
      classification: "TRANSIENT",
      diagnosticRef: null
    });

    const [{ topic, messages }] = producer.send.mock.calls[0];
    expect(topic).toBe("publish.failed");
    expect(JSON.parse(messages[0].value).data).toEqual({
      requestId: "req-1",
      attempts: 3,
      lastError: "editor did not load",
      classification: "TRANSIENT",
      diagnosticRef: null,
      itemKey: "https://news.example/a",
      title: "Title https://news.example/a"
    });
  });

  test("propagates producer failures to the caller", async () => {
    const producer = { send: vi.fn().mockRejectedValue(new Error("broker unavailable")) };
    const notifier = new KafkaNotifier(producer, new DecisionQueue(), "publishing-service");

    await expect(notifier.send(request)).rejects.toThrow("broker unavailable");
  });

  test("hands out the decision queue it was given", () => {
    const decisions = new DecisionQueue();
    const notifier = new KafkaNotifier({ send: vi.fn() }, decisions, "publishing-service");
    expect(notifier.receiveDecisions()).toBe(decisions);
  });
});

describe("QueuedSource", () => {
  test("offers each announced key once per pass", () => {
    const source = new QueuedSource();
    source.offer(makeItem("a"));
    source.offer(makeItem("b"));
    source.offer(makeItem("a", { title: "Duplicate" }));
    expect(source.size()).toBe(2);

    expect(Array.from(source.discover()).map((item) => item.title)).toEqual(["Title a", "Title b"]);
    expect(Array.from(source.discover())).toEqual([]);
  });
});

describe("composePostText", () => {
  test("omits empty framing", () => {
    expect(composePostText(makeItem("https://news.example/b"), " Summary text ", { prefix: "", suffix: "  " })).toBe(
      "Summary text\n\nRead more: https://news.example/b"
    );
  });
});
