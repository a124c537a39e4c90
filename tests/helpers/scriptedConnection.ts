import { TransportError } from "../../services/showdown-client/src/infra/errors";
import type { Connection } from "../../services/showdown-client/src/transport/connection";

/**
 * Replays canned frames in order. Once the script runs dry a timed receive
 * reports a timeout, and an untimed one fails the way a closed socket does.
 */
export class ScriptedConnection implements Connection {
  readonly sent: string[] = [];
  readonly timeouts: Array<number | undefined> = [];
  closed = false;

  constructor(private readonly frames: string[]) {}

  async send(text: string) {
    if (this.closed) throw new TransportError("connection closed");
    this.sent.push(text);
  }

  async receive(timeoutMs?: number) {
    this.timeouts.push(timeoutMs);
    const frame = this.frames.shift();
    if (frame !== undefined) return frame;
    if (timeoutMs === undefined) throw new TransportError("connection closed");
    return null;
  }

  async close() {
    this.closed = true;
  }

  get remaining() {
    return this.frames.length;
  }
}

/** Clock that only moves when told to. */
export function manualClock(start = 1_000_000) {
  let now = start;
  const clock = () => now;
  clock.advance = (ms: number) => {
    now += ms;
  };
  return clock;
}

export async function rejectionOf(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof Error) return err;
    throw new Error(`rejected with a non-error: ${String(err)}`);
  }
  throw new Error("expected the promise to reject");
}
