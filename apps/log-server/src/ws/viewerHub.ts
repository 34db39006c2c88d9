import type http from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { ViewerConfig } from "../env.js";
import { describeError, type Logger } from "../logging/logger.js";
import type { Publisher } from "../logging/publisher.js";
import { parseConnectParams, type ConnectParams } from "./protocol.js";
import { Subscription, type ViewerTransport } from "./subscription.js";

function wsTransport(ws: WebSocket): ViewerTransport {
  return {
    get bufferedAmount() {
      return ws.bufferedAmount;
    },
    isOpen: () => ws.readyState === WebSocket.OPEN,
    send: (data, cb) => ws.send(data, cb),
    close: (code, reason) => ws.close(code, reason),
  };
}

function rawToText(raw: RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString("utf-8");
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf-8");
  return Buffer.from(raw).toString("utf-8");
}

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.once("finish", () => socket.destroy());
  socket.end(`HTTP/1.1 ${status}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

/**
 * 实时日志查看器服务：每个 WebSocket 连接对应一个 Subscription。
 */
export class ViewerHub {
  private readonly publisher: Publisher;
  private readonly config: ViewerConfig;
  private readonly log: Logger;
  private readonly subscriptions = new Set<Subscription>();
  private readonly wss: WebSocketServer;
  private stopSignal: (() => void) | null = null;
  private nextId = 1;
  private closed = false;

  constructor(opts: { publisher: Publisher; config: ViewerConfig; log: Logger }) {
    this.publisher = opts.publisher;
    this.config = opts.config;
    this.log = opts.log;
    this.wss = new WebSocketServer({ noServer: true });
  }

  attach(server: http.Server, pathname: string = "/ws"): void {
    this.stopSignal ??= this.publisher.onAppend(() => this.signal());

    server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
      if (this.closed) {
        rejectUpgrade(socket, "503 Service Unavailable");
        return;
      }
      let url: URL;
      try {
        url = new URL(req.url ?? "", `http://${req.headers.host ?? "localhost"}`);
      } catch (err) {
        this.log.warn(`rejected upgrade with malformed url: ${describeError(err)}`);
        rejectUpgrade(socket, "400 Bad Request");
        return;
      }
      if (url.pathname !== pathname) return;
      const params = parseConnectParams(url.searchParams, this.config);
      if (!params) {
        rejectUpgrade(socket, "400 Bad Request");
        return;
      }
      this.wss.handleUpgrade(req, socket, head, (ws) => this.accept(ws, params));
    });
  }

  getClientCount(): number {
    return this.subscriptions.size;
  }

  /**
   * 终止所有订阅并等待其循环退出，然后关闭 WebSocketServer。
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.stopSignal?.();
    this.stopSignal = null;
    const pending: Promise<void>[] = [];
    for (const sub of [...this.subscriptions]) {
      sub.close("server-shutdown");
      pending.push(sub.whenDone());
    }
    await Promise.all(pending);
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private accept(ws: WebSocket, params: ConnectParams): void {
    // 握手期间 hub 已关闭
    if (this.closed) {
      ws.close(1001, "server-shutdown");
      return;
    }
    const sub = new Subscription({
      id: `viewer-${this.nextId++}`,
      publisher: this.publisher,
      transport: wsTransport(ws),
      config: this.config,
      params,
      log: this.log,
      onEnd: (s) => {
        this.subscriptions.delete(s);
        this.log.info(`${s.id} ended (${s.reason ?? "unknown"}), ${this.subscriptions.size} viewers`);
      },
    });
    this.subscriptions.add(sub);

    ws.on("message", (raw) => sub.handleMessage(rawToText(raw)));
    ws.on("close", () => sub.transportClosed());
    ws.on("error", (err) => sub.fail(err));

    this.log.info(
      `${sub.id} connected (minLevel=${params.minLevel}, refreshIntervalMs=${sub.settings.refreshIntervalMs}), ${this.subscriptions.size} viewers`
    );
    sub.start();
  }

  private signal(): void {
    for (const sub of this.subscriptions) sub.notify();
  }
}
