// Scam Honeypot - HTTP and WebSocket Server
// REST endpoint for message-by-message engagement plus a live WebSocket
// channel. Session data lives in server memory only.

import express, { type ErrorRequestHandler, type Express } from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";
import { apiKeyMatches, requireApiKey, upgradeApiKey } from "./auth.js";
import { createConsoleLogger } from "./logger.js";
import { SessionManager } from "./session-manager.js";
import { STAGE_KEYS, type ClientMessage, type HoneypotResponse, type Logger, type ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Path the live channel is served on */
export const LIVE_PATH = "/live";

/** Reply sent when a request passed validation but the turn could not be processed */
const FALLBACK_REPLY = "Sorry, I did not understand. Can you please say that again?";

const BODY_LIMIT = "100kb";

// ─── Request Schemas ────────────────────────────────────────────────────────────

const ChatMessageSchema = z.object({
  sender: z.string().min(1),
  text: z.string().max(10_000),
  timestamp: z.union([z.string(), z.number()]).optional(),
});

export const HoneypotRequestSchema = z.object({
  sessionId: z.string().min(1).max(200),
  message: ChatMessageSchema,
  conversationHistory: z.array(ChatMessageSchema).default([]),
  metadata: z.record(z.unknown()).optional(),
});

const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("scammer_message"), text: z.string().max(10_000), sessionId: z.string().min(1).max(200).optional() }),
  z.object({ type: z.literal("ping") }),
]);

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string;
  messagesReceived: number;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Key every HTTP request and WebSocket upgrade must present */
  apiKey: string;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Externally provided SessionManager (for testing). Created internally if omitted. */
  sessionManager?: SessionManager;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number, host?: string): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { apiKey, logger = createConsoleLogger("Server"), sessionManager = new SessionManager() } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", sessions: sessionManager.sessionCount });
  });

  app.post("/honeypot", requireApiKey(apiKey), express.json({ limit: BODY_LIMIT }), (req, res) => {
    const parsed = HoneypotRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        status: "error",
        message: "Invalid request body",
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
      return;
    }

    const respond = (reply: string) => {
      const body: HoneypotResponse = { status: "success", reply };
      res.json(body);
    };
    sessionManager.handleMessage(parsed.data).then(
      (handled) => respond(handled.reply),
      (err: unknown) => {
        const errorMessage = err instanceof Error ? err.message : String(err);
        logger.error(`Error handling message for session ${parsed.data.sessionId}: ${errorMessage}`);
        respond(FALLBACK_REPLY);
      },
    );
  });

  const handleBodyError: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ status: "error", message: "Malformed JSON body" });
      return;
    }
    next(err);
  };
  app.use(handleBodyError);

  // WebSocket server shares the HTTP server; upgrades are authenticated first
  const wss = new WebSocketServer({ noServer: true });

  httpServer.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    if (pathname !== LIVE_PATH) {
      rejectUpgrade(socket, 404, "Not Found");
      return;
    }
    if (!apiKeyMatches(apiKey, upgradeApiKey(req))) {
      logger.warn("Rejected WebSocket upgrade with a missing or invalid API key");
      rejectUpgrade(socket, 401, "Unauthorized");
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number, host?: string): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        const onListening = () => {
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port}`);
          resolve();
        };
        if (host) httpServer.listen(port, host, onListening);
        else httpServer.listen(port, onListening);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(ws: WebSocket, sessionManager: SessionManager, logger: Logger): void {
  const connState: ConnectionState = {
    sessionId: sessionManager.createSessionId(),
    messagesReceived: 0,
  };

  logger.info(`New WebSocket connection, session ${connState.sessionId}`);
  sendMessage(ws, { type: "session_started", sessionId: connState.sessionId });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) throw new Error("Binary frames are not supported");
      const message = parseClientMessage(rawText(data));
      handleClientMessage(ws, message, connState, sessionManager, logger);
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.warn(`Bad frame on session ${connState.sessionId}: ${errorMessage}`);
      sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
    }
  });

  // Protocol violations surface here; ws closes the socket afterwards
  ws.on("error", (err) => {
    logger.warn(`WebSocket error for session ${connState.sessionId}: ${err.message}`);
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, session ${connState.sessionId}`);
  });
}

function rawText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

export function parseClientMessage(text: string): ClientMessage {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new Error("Invalid message: not valid JSON");
  }
  const parsed = ClientMessageSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(`Invalid message: ${first.path.join(".") || "type"} ${first.message}`);
  }
  return parsed.data;
}

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err: unknown) => {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Async error for session ${connState.sessionId}: ${errorMessage}`);
      sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
    });
  };

  switch (message.type) {
    case "ping":
      sendMessage(ws, { type: "pong" });
      break;

    case "scammer_message":
      if (connState.messagesReceived === 0 && message.sessionId) connState.sessionId = message.sessionId;
      connState.messagesReceived++;
      catchAsync(handleScammerMessage(ws, message.text, connState.sessionId, sessionManager));
      break;
  }
}

async function handleScammerMessage(
  ws: WebSocket,
  text: string,
  sessionId: string,
  sessionManager: SessionManager,
): Promise<void> {
  const handled = await sessionManager.handleMessage({
    sessionId,
    message: { sender: "scammer", text },
    conversationHistory: [],
  });
  sendMessage(ws, {
    type: "agent_reply",
    sessionId,
    reply: handled.reply,
    scamDetected: handled.scamDetected,
    stage: STAGE_KEYS[handled.stage],
  });
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

/**
 * Sends a typed ServerMessage as JSON over the WebSocket.
 * Silently drops the message if the socket is not open.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
