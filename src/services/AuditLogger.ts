import mongoose from "mongoose";
import { AuditEventModel, IAuditEventDoc } from "../models/AuditEvent";
import { IDecision, ITradeOutcomeReport, OutcomeAck } from "../types/decision.types";
import {
  AuditComponent,
  AuditKind,
  IAuditEvent,
  IAuditQuery,
} from "../types/pipeline.types";
import { ComplianceLevel, IComplianceAlert, IComplianceReport } from "../types/risk.types";
import { logger } from "../utils/logger";

/** Append-only event log, queryable by time range and component. */
export interface AuditStore {
  append(event: IAuditEvent): Promise<void>;
  query(query: IAuditQuery): Promise<IAuditEvent[]>;
}

export class MongoAuditStore implements AuditStore {
  async append(event: IAuditEvent): Promise<void> {
    await AuditEventModel.create(event);
  }

  async query(query: IAuditQuery): Promise<IAuditEvent[]> {
    const filter: mongoose.FilterQuery<IAuditEventDoc> = {};
    if (query.component) filter.component = query.component;
    if (query.from || query.to) {
      filter.timestamp = {
        ...(query.from ? { $gte: query.from } : {}),
        ...(query.to ? { $lte: query.to } : {}),
      };
    }

    const docs = await AuditEventModel.find(filter)
      .sort({ timestamp: 1 })
      .limit(query.limit ?? 1000)
      .lean();
    return docs.map((d) => ({
      timestamp: d.timestamp,
      component: d.component,
      kind: d.kind,
      payload: d.payload,
    }));
  }
}

export class InMemoryAuditStore implements AuditStore {
  private events: IAuditEvent[] = [];

  constructor(private readonly capacity: number = 10_000) {}

  async append(event: IAuditEvent): Promise<void> {
    this.events.push(event);
    if (this.events.length > this.capacity) this.events.shift();
  }

  async query(query: IAuditQuery): Promise<IAuditEvent[]> {
    const from = query.from?.getTime() ?? -Infinity;
    const to = query.to?.getTime() ?? Infinity;
    return this.events
      .filter(
        (e) =>
          (!query.component || e.component === query.component) &&
          e.timestamp.getTime() >= from &&
          e.timestamp.getTime() <= to
      )
      .slice(0, query.limit ?? 1000);
  }

  size(): number {
    return this.events.length;
  }
}

/**
 * Fire-and-forget audit writer. A failed write is logged and never reaches
 * the decision path.
 */
export class AuditLogger {
  private inFlight = new Set<Promise<void>>();

  constructor(
    private readonly store: AuditStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  recordDecision(decision: IDecision): void {
    this.write("decision_engine", "decision", { ...decision, reasoning: [...decision.reasoning] });
  }

  /** Only rules at WARNING or above are written. */
  recordEvaluation(report: IComplianceReport): void {
    for (const rule of report.rules) {
      if (rule.level === ComplianceLevel.SAFE) continue;
      this.write("compliance_monitor", "rule_evaluation", {
        ...rule,
        tradingEnabled: report.tradingEnabled,
        tradingDay: report.tradingDay,
      });
    }
  }

  recordOutcome(report: ITradeOutcomeReport, ack: OutcomeAck): void {
    this.write("pipeline", "trade_outcome", { ...report, ...ack });
  }

  recordRejectedReading(raw: unknown, reason: string): void {
    this.write("pipeline", "reading_rejected", { raw, reason });
  }

  recordHalt(alert: IComplianceAlert): void {
    this.write("compliance_monitor", "trading_halted", { ...alert });
  }

  recordResume(operator: string): void {
    this.write("compliance_monitor", "trading_resumed", { operator });
  }

  query(query: IAuditQuery): Promise<IAuditEvent[]> {
    return this.store.query(query);
  }

  /** Resolves once every write issued so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private write(component: AuditComponent, kind: AuditKind, payload: Record<string, unknown>): void {
    const event: IAuditEvent = { timestamp: this.now(), component, kind, payload };
    const pending: Promise<void> = this.store
      .append(event)
      .catch((err: unknown) => {
        logger.error(`Audit write failed (${component}/${kind})`, err);
      })
      .finally(() => {
        this.inFlight.delete(pending);
      });
    this.inFlight.add(pending);
  }
}
