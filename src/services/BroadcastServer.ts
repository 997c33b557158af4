import http from "http";
import { RawData, WebSocket, WebSocketServer } from "ws";
import { z } from "zod";
import { ITradeOutcomeReport, OutcomeAck } from "../types/decision.types";
import { SubscriberClass } from "../types/pipeline.types";
import { logger } from "../utils/logger";
import { DecisionBroadcaster, ISubscriberSink } from "./DecisionBroadcaster";

export type ClientRole = "dashboard" | "execution" | "reader";

export type InboundReply = Record<string, unknown> & { type: string };

/** What the server does with inbound client messages. */
export interface IInboundHandlers {
  onTradeOutcome(report: ITradeOutcomeReport): OutcomeAck;
  onMarketUpdate(raw: unknown): void;
  onSignalReading(raw: unknown): void;
  onResumeTrading(operator: string): boolean;
}

const InboundSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("trade_outcome"),
    decisionId: z.string().min(1),
    pnl: z.number().finite(),
    closedAt: z.union([z.string(), z.number()]).optional(),
  }),
  z.object({ type: z.literal("market_update"), payload: z.unknown() }),
  z.object({ type: z.literal("signal_reading"), payload: z.unknown() }),
  z.object({
    type: z.literal("resume_trading"),
    operator: z.string().min(1),
    token: z.string().optional(),
  }),
]);

type InboundMessage = z.infer<typeof InboundSchema>;

const ALLOWED: Record<InboundMessage["type"], ClientRole> = {
  trade_outcome: "execution",
  market_update: "execution",
  signal_reading: "reader",
  resume_trading: "dashboard",
};

export function parseRole(url: string | undefined): ClientRole | null {
  const role = new URL(url ?? "/", "http://localhost").searchParams.get("role") ?? "dashboard";
  return role === "dashboard" || role === "execution" || role === "reader" ? role : null;
}

/**
 * Validates one inbound client message, checks the sender's role and runs
 * the matching handler. Returns the reply to send back, if any.
 * `resume_trading` also needs the operator token; without one configured
 * it is refused.
 */
export function routeInboundMessage(
  role: ClientRole,
  text: string,
  handlers: IInboundHandlers,
  operatorToken?: string
): InboundReply | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return { type: "error", error: "malformed JSON" };
  }

  const parsed = InboundSchema.safeParse(json);
  if (!parsed.success) {
    return { type: "error", error: parsed.error.issues.map((i) => i.message).join("; ") };
  }

  const message = parsed.data;
  if (ALLOWED[message.type] !== role) {
    return { type: "error", error: `${message.type} not permitted for ${role}` };
  }

  try {
    switch (message.type) {
      case "trade_outcome": {
        const closedAt = message.closedAt === undefined ? undefined : new Date(message.closedAt);
        const ack = handlers.onTradeOutcome({
          decisionId: message.decisionId,
          pnl: message.pnl,
          closedAt: closedAt && !Number.isNaN(closedAt.getTime()) ? closedAt : undefined,
        });
        return { type: "outcome_ack", ...ack };
      }
      case "market_update":
        handlers.onMarketUpdate(message.payload);
        return null;
      case "signal_reading":
        handlers.onSignalReading(message.payload);
        return null;
      case "resume_trading":
        if (!operatorToken) {
          return { type: "error", error: "resume_trading disabled: no operator token configured" };
        }
        if (message.token !== operatorToken) {
          logger.warning(`Rejected resume_trading from ${message.operator}: bad operator token`);
          return { type: "error", error: "invalid operator token" };
        }
        return { type: "resume_ack", resumed: handlers.onResumeTrading(message.operator) };
    }
  } catch (err) {
    logger.warning(`Inbound ${message.type} rejected`, err);
    return { type: "error", error: err instanceof Error ? err.message : String(err) };
  }
}

function decode(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function socketSink(ws: WebSocket): ISubscriberSink {
  return {
    deliver: (message) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error("socket not open"));
          return;
        }
        ws.send(JSON.stringify(message), (err) => (err ? reject(err) : resolve()));
      }),
    close: (reason) => ws.close(1008, reason.slice(0, 120)),
  };
}

/**
 * WebSocket front for the broadcaster. `?role=` picks the delivery class;
 * readers only push readings and receive nothing.
 */
export class BroadcastServer {
  private httpServer: http.Server | null = null;
  private wss: WebSocketServer | null = null;
  private startTime = 0;

  constructor(
    private readonly broadcaster: DecisionBroadcaster,
    private readonly handlers: IInboundHandlers,
    private readonly port: number = 8765,
    private readonly operatorToken?: string
  ) {}

  async start(): Promise<void> {
    this.startTime = Date.now();

    const server = http.createServer((req, res) => {
      if (req.url === "/health") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(
          JSON.stringify({
            status: "ok",
            uptime: Date.now() - this.startTime,
            subscribers: this.broadcaster.getSubscriberCount(),
          })
        );
      } else {
        res.writeHead(404);
        res.end("Not found");
      }
    });
    const wss = new WebSocketServer({ server });
    wss.on("connection", (ws, req) => this.handleConnection(ws, req));

    this.httpServer = server;
    this.wss = wss;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, () => {
        logger.success(`Broadcast server listening on ws://localhost:${this.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    this.broadcaster.closeAll("server shutting down");
    const wss = this.wss;
    const server = this.httpServer;
    this.wss = null;
    this.httpServer = null;

    if (wss) {
      for (const client of wss.clients) client.close();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    if (server) {
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
    }
    logger.info("Broadcast server stopped");
  }

  private handleConnection(ws: WebSocket, req: http.IncomingMessage): void {
    const role = parseRole(req.url);
    if (!role) {
      ws.close(1008, "unknown role");
      return;
    }

    let subscriberId: string | null = null;
    if (role !== "reader") {
      const cls = role === "execution" ? SubscriberClass.EXECUTION : SubscriberClass.DASHBOARD;
      subscriberId = this.broadcaster.subscribe(cls, socketSink(ws));
    }

    ws.on("message", (data) => this.handleMessage(ws, role, decode(data)));
    ws.on("error", (err) => logger.warning(`Socket error (${role})`, err));
    ws.on("close", () => {
      if (subscriberId) this.broadcaster.unsubscribe(subscriberId);
    });
  }

  private handleMessage(ws: WebSocket, role: ClientRole, text: string): void {
    const reply = routeInboundMessage(role, text, this.handlers, this.operatorToken);
    if (reply) this.reply(ws, reply);
  }

  private reply(ws: WebSocket, body: InboundReply): void {
    if (ws.readyState !== WebSocket.OPEN) return;
    ws.send(JSON.stringify(body), (err) => {
      if (err) logger.warning("Reply send failed", err);
    });
  }
}
