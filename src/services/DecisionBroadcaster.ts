import { v4 as uuidv4 } from "uuid";
import { BroadcastConfig, DEFAULT_GUARDIAN_CONFIG } from "../config/guardianConfig";
import { IDecision } from "../types/decision.types";
import { BroadcastMessage, DecisionPublisher, SubscriberClass } from "../types/pipeline.types";
import { logger } from "../utils/logger";

/** Transport end of one subscriber. */
export interface ISubscriberSink {
  deliver(message: BroadcastMessage): Promise<void> | void;
  close?(reason: string): void;
}

interface ISubscriber {
  id: string;
  cls: SubscriberClass;
  sink: ISubscriberSink;
  queue: BroadcastMessage[];
  draining: boolean;
  closed: boolean;
}

/**
 * Fans messages out to subscribers without ever waiting on them. Each
 * subscriber has its own bounded FIFO drained by its own loop, so it sees
 * messages in production order and a slow one only hurts itself.
 */
export class DecisionBroadcaster implements DecisionPublisher {
  private subscribers = new Map<string, ISubscriber>();
  private dropped = 0;

  constructor(private readonly config: BroadcastConfig = DEFAULT_GUARDIAN_CONFIG.broadcast) {}

  subscribe(cls: SubscriberClass, sink: ISubscriberSink, id: string = uuidv4()): string {
    this.subscribers.set(id, { id, cls, sink, queue: [], draining: false, closed: false });
    logger.info(`Subscriber ${id} joined (${cls}), ${this.subscribers.size} connected`);
    return id;
  }

  unsubscribe(id: string): boolean {
    const sub = this.subscribers.get(id);
    if (!sub) return false;
    sub.closed = true;
    sub.queue = [];
    this.subscribers.delete(id);
    logger.info(`Subscriber ${id} left (${sub.cls})`);
    return true;
  }

  publish(decision: IDecision): void {
    this.broadcast({ type: "decision", payload: decision });
  }

  /** Enqueues for every subscriber, or only those of the given classes. */
  broadcast(message: BroadcastMessage, classes?: SubscriberClass[]): void {
    for (const sub of [...this.subscribers.values()]) {
      if (classes && !classes.includes(sub.cls)) continue;
      this.enqueue(sub, message);
    }
  }

  getSubscriberCount(cls?: SubscriberClass): number {
    if (!cls) return this.subscribers.size;
    let count = 0;
    for (const sub of this.subscribers.values()) if (sub.cls === cls) count++;
    return count;
  }

  getDroppedCount(): number {
    return this.dropped;
  }

  closeAll(reason: string): void {
    for (const sub of [...this.subscribers.values()]) this.drop(sub, reason, false);
  }

  private enqueue(sub: ISubscriber, message: BroadcastMessage): void {
    if (sub.queue.length >= this.config.maxQueuePerSubscriber) {
      this.drop(sub, `queue full (${sub.queue.length} pending)`, true);
      return;
    }
    sub.queue.push(message);
    if (!sub.draining) {
      this.drain(sub).catch((err: unknown) => {
        logger.error(`Subscriber ${sub.id} drain loop failed`, err);
      });
    }
  }

  private async drain(sub: ISubscriber): Promise<void> {
    sub.draining = true;
    try {
      // The in-flight message is off the queue, so the bound counts waiting messages only
      while (!sub.closed) {
        const message = sub.queue.shift();
        if (!message) break;
        try {
          await sub.sink.deliver(message);
        } catch (err) {
          this.drop(sub, `delivery failed: ${err instanceof Error ? err.message : String(err)}`, true);
          return;
        }
      }
    } finally {
      sub.draining = false;
    }
  }

  private drop(sub: ISubscriber, reason: string, counted: boolean): void {
    if (!this.unsubscribe(sub.id)) return;
    if (counted) {
      this.dropped++;
      logger.warning(`Dropped ${sub.cls} subscriber ${sub.id}: ${reason}`);
    }
    if (sub.sink.close) {
      try {
        sub.sink.close(reason);
      } catch (err) {
        logger.error(`Closing subscriber ${sub.id} failed`, err);
      }
    }
  }
}
