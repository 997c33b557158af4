import cron from "node-cron";
import { GuardianConfig } from "../config/guardianConfig";
import { AuditLogger } from "../services/AuditLogger";
import { IInboundHandlers } from "../services/BroadcastServer";
import { DecisionBroadcaster } from "../services/DecisionBroadcaster";
import { MarketContextProvider } from "../services/MarketContextProvider";
import { SignalSource } from "../services/SignalSource";
import { loadTradeHistory, saveTradeHistory } from "../services/TradeHistoryFile";
import { IDecision, ITradeOutcomeReport, OutcomeAck } from "../types/decision.types";
import { ICircuitBreakerState, SubscriberClass } from "../types/pipeline.types";
import { IComplianceReport } from "../types/risk.types";
import { ISignalReading } from "../types/signal.types";
import { CircuitBreaker } from "../utils/circuitBreaker";
import { InvalidInputError } from "../utils/errors";
import { logger } from "../utils/logger";
import { TimeoutError, withTimeout } from "../utils/timeout";
import { CadenceHealthMonitor } from "./CadenceHealthMonitor";
import { CadenceTracker } from "./CadenceTracker";
import { ComplianceMonitor } from "./ComplianceMonitor";
import { DecisionEngine } from "./DecisionEngine";
import { KellyEngine } from "./KellyEngine";
import { parseSignalReading } from "./SignalValidator";

export interface IOrchestratorOptions {
  config: GuardianConfig;
  audit: AuditLogger;
  source?: SignalSource | null;
  broadcaster?: DecisionBroadcaster;
  /** Trade-history snapshot restored on start and written back on shutdown. */
  historyPath?: string | null;
  now?: () => Date;
}

/**
 * Builds the decision core once, feeds it readings (pulled or pushed) and
 * outcomes, and runs the periodic compliance and status jobs.
 */
export class Orchestrator {
  readonly cadence: CadenceTracker;
  readonly health: CadenceHealthMonitor;
  readonly sizing: KellyEngine;
  readonly compliance: ComplianceMonitor;
  readonly engine: DecisionEngine;
  readonly markets: MarketContextProvider;
  readonly broadcaster: DecisionBroadcaster;

  private readonly config: GuardianConfig;
  private readonly audit: AuditLogger;
  private readonly source: SignalSource | null;
  private readonly historyPath: string | null;
  private readonly breaker: CircuitBreaker;
  private cronJobs: ReturnType<typeof cron.schedule>[] = [];
  private pollHandle: NodeJS.Timeout | null = null;
  private polling = false;
  private unsubscribeAlerts: (() => void) | null = null;

  constructor(options: IOrchestratorOptions) {
    const { config } = options;
    const now = options.now ?? (() => new Date());

    this.config = config;
    this.audit = options.audit;
    this.source = options.source ?? null;
    this.historyPath = options.historyPath ?? null;
    this.broadcaster = options.broadcaster ?? new DecisionBroadcaster(config.broadcast);

    this.cadence = new CadenceTracker(config.cadence, now);
    this.health = new CadenceHealthMonitor(config.cadence);
    this.sizing = new KellyEngine(config.sizing, now);
    this.compliance = new ComplianceMonitor(config.compliance, now);
    this.markets = new MarketContextProvider(config.markets, now);
    this.engine = new DecisionEngine({
      cadence: this.cadence,
      health: this.health,
      sizing: this.sizing,
      compliance: this.compliance,
      publisher: this.broadcaster,
      config: config.decision,
      now,
    });

    this.breaker = new CircuitBreaker(
      this.source?.name ?? "signal-source",
      config.pipeline.readerFailureThreshold,
      config.pipeline.readerCooldownMs
    );

    this.unsubscribeAlerts = this.compliance.onAlert((alert, tradingEnabled) => {
      this.broadcaster.broadcast({ type: "compliance_alert", payload: { ...alert, tradingEnabled } });
      if (alert.action === "trading_halted") this.audit.recordHalt(alert);
    });
  }

  start(): void {
    const { pipeline } = this.config;
    this.restoreHistory();

    this.cronJobs.push(cron.schedule(pipeline.complianceCron, () => this.runComplianceCheck()));
    this.cronJobs.push(cron.schedule(pipeline.statusCron, () => this.broadcastStatus()));

    if (this.source) {
      this.pollHandle = setInterval(() => {
        this.pollOnce().catch((err: unknown) => logger.error("Signal poll failed", err));
      }, pipeline.readIntervalMs);
      logger.info(`Polling ${this.source.name} every ${pipeline.readIntervalMs}ms`);
    }

    logger.success(
      `Decision core started | ${this.compliance.getRules().length} compliance rules | equity $${this.sizing.getEquity().toFixed(2)}`
    );
  }

  async shutdown(): Promise<void> {
    logger.info("Shutting down decision core...");
    for (const job of this.cronJobs) job.stop();
    this.cronJobs = [];
    if (this.pollHandle) {
      clearInterval(this.pollHandle);
      this.pollHandle = null;
    }
    if (this.unsubscribeAlerts) {
      this.unsubscribeAlerts();
      this.unsubscribeAlerts = null;
    }
    await this.persistHistory();
    await this.audit.flush();
  }

  /** Replays the saved trade window into the sizing engine. Returns the trades restored. */
  restoreHistory(): number {
    if (!this.historyPath) return 0;
    const snapshot = loadTradeHistory(this.historyPath);
    if (!snapshot) {
      logger.info(`No trade history at ${this.historyPath}; Kelly sizing starts from the default`);
      return 0;
    }
    return this.sizing.importHistory(snapshot);
  }

  async persistHistory(): Promise<void> {
    if (!this.historyPath) return;
    const snapshot = this.sizing.exportHistory();
    await saveTradeHistory(this.historyPath, snapshot);
    logger.info(`Saved ${snapshot.trades.length} trades to ${this.historyPath}`);
  }

  /**
   * One pull from the signal source. A timeout, an open circuit or an
   * empty read all mean "no new reading" for this cycle.
   */
  async pollOnce(): Promise<IDecision | null> {
    if (!this.source || this.polling) return null;
    if (!this.breaker.isAllowed()) return null;

    this.polling = true;
    let raw: unknown;
    try {
      raw = await withTimeout(this.source.read(), this.config.pipeline.readerTimeoutMs, this.source.name);
      this.breaker.recordSuccess();
    } catch (err) {
      this.breaker.recordFailure();
      if (err instanceof TimeoutError) {
        logger.debug(err.message);
      } else {
        logger.warning(`Signal source ${this.source.name} failed`, err);
      }
      return null;
    } finally {
      this.polling = false;
    }

    if (raw === null || raw === undefined) return null;
    return this.processReading(raw);
  }

  /** Validates and decides on one raw reading. Rejected readings return null. */
  processReading(raw: unknown): IDecision | null {
    let reading: ISignalReading;
    try {
      reading = parseSignalReading(raw, this.config.decision, this.config.pipeline.defaultInstrument);
      const session = this.cadence.currentSession(reading.timestamp);
      if (reading.sessionTag !== session) {
        throw new InvalidInputError(
          `Rejected signal reading: sessionTag ${reading.sessionTag} disagrees with ${session} at ${reading.timestamp.toISOString()}`,
          "INVALID_READING"
        );
      }
    } catch (err) {
      if (!(err instanceof InvalidInputError)) throw err;
      logger.warning(err.message);
      this.audit.recordRejectedReading(raw, err.message);
      return null;
    }

    this.health.observe(reading);
    const decision = this.engine.evaluate(reading, this.markets.get(reading.instrument));
    this.audit.recordDecision(decision);
    return decision;
  }

  /** Settles a trade, then re-evaluates compliance so an auto-stop lands before the next reading. */
  reportOutcome(report: ITradeOutcomeReport): OutcomeAck {
    const ack = this.engine.reportOutcome(report);
    this.audit.recordOutcome(report, ack);
    if (ack.accepted) {
      this.runComplianceCheck();
    } else {
      logger.warning(`Outcome for ${report.decisionId} rejected: ${ack.reason}`);
    }
    return ack;
  }

  updateMarket(raw: unknown): void {
    const context = this.markets.update(raw);
    logger.debug(`Market ${context.instrument}: price ${context.price}, ATR ${context.atr}`);
  }

  resumeTrading(operator: string): boolean {
    const resumed = this.compliance.resumeTrading(operator);
    if (resumed) {
      this.audit.recordResume(operator);
      this.broadcastStatus();
    }
    return resumed;
  }

  runComplianceCheck(): IComplianceReport {
    const report = this.compliance.evaluate();
    this.audit.recordEvaluation(report);
    this.broadcaster.broadcast({ type: "compliance_report", payload: report }, [SubscriberClass.DASHBOARD]);
    return report;
  }

  broadcastStatus(): void {
    this.broadcaster.broadcast({ type: "status", payload: this.engine.getStatus() });
  }

  inboundHandlers(): IInboundHandlers {
    return {
      onTradeOutcome: (report) => this.reportOutcome(report),
      onMarketUpdate: (raw) => this.updateMarket(raw),
      onSignalReading: (raw) => {
        this.processReading(raw);
      },
      onResumeTrading: (operator) => this.resumeTrading(operator),
    };
  }

  getSourceState(): ICircuitBreakerState {
    return this.breaker.getState();
  }
}
