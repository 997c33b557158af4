import mongoose, { Schema, Document } from "mongoose";
import { AuditComponent, AuditKind } from "../types/pipeline.types";

export interface IAuditEventDoc extends Document {
  timestamp: Date;
  component: AuditComponent;
  kind: AuditKind;
  payload: Record<string, unknown>;
}

const COMPONENTS: AuditComponent[] = [
  "decision_engine",
  "compliance_monitor",
  "pipeline",
];

const KINDS: AuditKind[] = [
  "decision",
  "rule_evaluation",
  "trade_outcome",
  "reading_rejected",
  "trading_halted",
  "trading_resumed",
];

// Append-only: nothing updates or deletes these documents
const AuditEventSchema = new Schema<IAuditEventDoc>({
  timestamp: { type: Date, required: true, index: true },
  component: { type: String, enum: COMPONENTS, required: true, index: true },
  kind: { type: String, enum: KINDS, required: true },
  payload: { type: Schema.Types.Mixed, default: {} },
});

AuditEventSchema.index({ component: 1, timestamp: -1 });

export const AuditEventModel = mongoose.model<IAuditEventDoc>("AuditEvent", AuditEventSchema);
