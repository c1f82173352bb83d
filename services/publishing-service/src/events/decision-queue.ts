import type { InboundDecision } from "../approvals/types";

/**
 * Single-consumer mailbox between decision transports (Kafka, HTTP) and the
 * orchestrator's dispatch loop.
 */
export class DecisionQueue implements AsyncIterable<InboundDecision> {
  private readonly buffered: InboundDecision[] = [];
  private readonly waiters: Array<(result: IteratorResult<InboundDecision>) => void> = [];
  private closed = false;

  push(decision: InboundDecision): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: decision, done: false });
    } else {
      this.buffered.push(decision);
    }
    return true;
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get pending(): number {
    return this.buffered.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<InboundDecision> {
    return {
      next: (): Promise<IteratorResult<InboundDecision>> => {
        const decision = this.buffered.shift();
        if (decision) {
          return Promise.resolve({ value: decision, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => this.waiters.push(resolve));
      },
      return: (): Promise<IteratorResult<InboundDecision>> => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      }
    };
  }
}
