import WebSocket from "ws";
import type { Logger } from "pino";
import { TransportError } from "../infra/errors";

export interface Connection {
  send(text: string): Promise<void>;
  /**
   * Next inbound frame. Resolves `null` when `timeoutMs` elapses first;
   * without a timeout it waits until a frame arrives or the socket closes.
   */
  receive(timeoutMs?: number): Promise<string | null>;
  close(): Promise<void>;
}

export type Connector = (uri: string) => Promise<Connection>;

type Waiter = {
  resolve: (frame: string | null) => void;
  reject: (err: Error) => void;
  timer?: NodeJS.Timeout;
};

const CLOSE_GRACE_MS = 2_000;

function toText(raw: WebSocket.RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  return Buffer.from(raw).toString("utf8");
}

export class WsConnection implements Connection {
  private readonly inbox: string[] = [];
  private readonly waiters: Waiter[] = [];
  private closedWith: TransportError | null = null;

  private constructor(
    private readonly ws: WebSocket,
    private readonly log: Logger
  ) {
    ws.on("message", (raw: WebSocket.RawData) => this.deliver(toText(raw)));
    ws.on("error", (err: Error) => {
      this.log.debug({ err }, "websocket error");
    });
    ws.on("close", (code: number) => {
      this.fail(new TransportError(`connection closed (code ${code})`));
    });
  }

  static open(uri: string, log: Logger): Promise<WsConnection> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(uri);
      const onError = (err: Error) => {
        ws.off("open", onOpen);
        reject(new TransportError(`could not connect to ${uri}`, { cause: err }));
      };
      const onOpen = () => {
        ws.off("error", onError);
        log.debug({ uri }, "websocket connected");
        resolve(new WsConnection(ws, log));
      };
      ws.once("open", onOpen);
      ws.once("error", onError);
    });
  }

  send(text: string): Promise<void> {
    if (this.closedWith) return Promise.reject(this.closedWith);
    return new Promise((resolve, reject) => {
      this.ws.send(text, (err?: Error) => {
        if (err) {
          reject(new TransportError("send failed", { cause: err }));
          return;
        }
        this.log.trace({ text }, ">>");
        resolve();
      });
    });
  }

  receive(timeoutMs?: number): Promise<string | null> {
    const queued = this.inbox.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closedWith) return Promise.reject(this.closedWith);

    return new Promise((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      if (timeoutMs !== undefined) {
        // A timed-out waiter leaves the queue, so no later frame is lost to it.
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          resolve(null);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(() => this.ws.terminate(), CLOSE_GRACE_MS);
      this.ws.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      if (this.ws.readyState !== WebSocket.CLOSING) this.ws.close();
    });
  }

  private deliver(frame: string) {
    this.log.trace({ frame }, "<<");
    const waiter = this.waiters.shift();
    if (!waiter) {
      this.inbox.push(frame);
      return;
    }
    clearTimeout(waiter.timer);
    waiter.resolve(frame);
  }

  private fail(err: TransportError) {
    this.closedWith = err;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(err);
    }
  }
}

export function createWsConnector(log: Logger): Connector {
  return (uri) => WsConnection.open(uri, log);
}
