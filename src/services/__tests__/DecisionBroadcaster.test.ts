import { describe, it, expect, vi } from "vitest";
import { BroadcastMessage, SubscriberClass } from "../../types/pipeline.types";
import { ComplianceLevel } from "../../types/risk.types";
import { DecisionBroadcaster, ISubscriberSink } from "../DecisionBroadcaster";

function alert(n: number): BroadcastMessage {
  return {
    type: "compliance_alert",
    payload: {
      timestamp: new Date("2026-01-15T15:00:00Z"),
      ruleId: `rule-${n}`,
      level: ComplianceLevel.WARNING,
      observedValue: n,
      thresholdValue: 10,
      message: `alert ${n}`,
      action: "none",
      tradingEnabled: true,
    },
  };
}

function ruleIds(messages: BroadcastMessage[]): string[] {
  return messages.map((m) => (m.type === "compliance_alert" ? m.payload.ruleId : m.type));
}

function recordingSink(): ISubscriberSink & { received: BroadcastMessage[] } {
  const received: BroadcastMessage[] = [];
  return {
    received,
    deliver: (message) => {
      received.push(message);
    },
  };
}

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("DecisionBroadcaster", () => {
  it("delivers messages to each subscriber in publish order", async () => {
    const broadcaster = new DecisionBroadcaster({ maxQueuePerSubscriber: 10 });
    const a = recordingSink();
    const b = recordingSink();
    broadcaster.subscribe(SubscriberClass.DASHBOARD, a);
    broadcaster.subscribe(SubscriberClass.EXECUTION, b);

    for (let i = 1; i <= 4; i++) broadcaster.broadcast(alert(i));
    await settle();

    expect(ruleIds(a.received)).toEqual(["rule-1", "rule-2", "rule-3", "rule-4"]);
    expect(ruleIds(b.received)).toEqual(["rule-1", "rule-2", "rule-3", "rule-4"]);
  });

  it("drops a subscriber whose queue overflows without affecting others", async () => {
    const broadcaster = new DecisionBroadcaster({ maxQueuePerSubscriber: 2 });
    const close = vi.fn();
    const stalled: ISubscriberSink = { deliver: () => new Promise<void>(() => undefined), close };
    const healthy = recordingSink();
    const stalledId = broadcaster.subscribe(SubscriberClass.DASHBOARD, stalled, "stalled");
    broadcaster.subscribe(SubscriberClass.DASHBOARD, healthy, "healthy");

    broadcaster.broadcast(alert(1));
    broadcaster.broadcast(alert(2));
    await settle();
    expect(close).not.toHaveBeenCalled();

    broadcaster.broadcast(alert(3));
    broadcaster.broadcast(alert(4));
    await settle();

    expect(stalledId).toBe("stalled");
    expect(close).toHaveBeenCalledWith("queue full (2 pending)");
    expect(broadcaster.getSubscriberCount()).toBe(1);
    expect(broadcaster.getDroppedCount()).toBe(1);
    expect(ruleIds(healthy.received)).toEqual(["rule-1", "rule-2", "rule-3", "rule-4"]);
  });

  it("does not count the message being delivered against the queue bound", async () => {
    const broadcaster = new DecisionBroadcaster({ maxQueuePerSubscriber: 2 });
    const fast = recordingSink();
    broadcaster.subscribe(SubscriberClass.EXECUTION, fast);

    for (let i = 1; i <= 3; i++) broadcaster.broadcast(alert(i));
    await settle();

    expect(broadcaster.getSubscriberCount()).toBe(1);
    expect(broadcaster.getDroppedCount()).toBe(0);
    expect(ruleIds(fast.received)).toEqual(["rule-1", "rule-2", "rule-3"]);
  });

  it("drops a subscriber whose delivery fails", async () => {
    const broadcaster = new DecisionBroadcaster();
    const close = vi.fn();
    broadcaster.subscribe(SubscriberClass.EXECUTION, {
      deliver: () => Promise.reject(new Error("socket not open")),
      close,
    });

    broadcaster.broadcast(alert(1));
    await settle();

    expect(close).toHaveBeenCalledWith("delivery failed: socket not open");
    expect(broadcaster.getSubscriberCount(SubscriberClass.EXECUTION)).toBe(0);
  });

  it("restricts a broadcast to the requested classes", async () => {
    const broadcaster = new DecisionBroadcaster();
    const dashboard = recordingSink();
    const execution = recordingSink();
    broadcaster.subscribe(SubscriberClass.DASHBOARD, dashboard);
    broadcaster.subscribe(SubscriberClass.EXECUTION, execution);

    broadcaster.broadcast(alert(1), [SubscriberClass.DASHBOARD]);
    await settle();

    expect(dashboard.received).toHaveLength(1);
    expect(execution.received).toHaveLength(0);
  });

  it("stops delivering after unsubscribe and closes everyone on closeAll", async () => {
    const broadcaster = new DecisionBroadcaster();
    const gone = recordingSink();
    const close = vi.fn();
    const id = broadcaster.subscribe(SubscriberClass.DASHBOARD, gone);
    broadcaster.subscribe(SubscriberClass.DASHBOARD, { deliver: () => undefined, close });

    expect(broadcaster.unsubscribe(id)).toBe(true);
    expect(broadcaster.unsubscribe(id)).toBe(false);
    broadcaster.broadcast(alert(1));
    await settle();
    expect(gone.received).toHaveLength(0);

    broadcaster.closeAll("server shutdown");
    expect(close).toHaveBeenCalledWith("server shutdown");
    expect(broadcaster.getSubscriberCount()).toBe(0);
    expect(broadcaster.getDroppedCount()).toBe(0);
  });
});
