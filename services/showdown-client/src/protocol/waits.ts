import { TimeoutError } from "../infra/errors";
import type { Connection } from "../transport/connection";
import { classify, commandOf, type BattleEventKind } from "./events";
import { demux } from "./frames";
import type { RequestSnapshot } from "./request";

export type Clock = () => number;

// Floor for a single read, so a nearly expired deadline still gets one poll.
const MIN_READ_TIMEOUT_MS = 100;

export type RequestWait = {
  request: RequestSnapshot | null;
  turn: number | null;
  error: string | null;
};

export type EventLogWait = RequestWait & {
  events: string[];
  finished: boolean;
  winner: string | null;
  tie: boolean;
};

export type BattleStart = {
  battleId: string;
  title: string | null;
};

async function receiveUntil(
  conn: Connection,
  deadlineMs: number,
  clock: Clock,
  onLine: (room: string, line: string) => boolean,
  onFrameEnd: () => boolean = () => false
): Promise<boolean> {
  while (clock() < deadlineMs) {
    const frame = await conn.receive(Math.max(MIN_READ_TIMEOUT_MS, deadlineMs - clock()));
    if (frame === null) break;
    for (const { room, line } of demux(frame)) {
      if (onLine(room, line)) return true;
    }
    if (onFrameEnd()) return true;
  }
  return false;
}

export async function waitFor(
  conn: Connection,
  room: string,
  deadlineMs: number,
  terminal: ReadonlySet<BattleEventKind>,
  clock: Clock = Date.now
): Promise<EventLogWait> {
  const result: EventLogWait = {
    request: null,
    turn: null,
    error: null,
    events: [],
    finished: false,
    winner: null,
    tie: false,
  };

  await receiveUntil(conn, deadlineMs, clock, (lineRoom, line) => {
    if (lineRoom !== room) return false;
    const event = classify(lineRoom, line);

    if (terminal.has(event.kind)) {
      switch (event.kind) {
        case "request":
          result.request = event.payload;
          break;
        case "win":
          result.finished = true;
          result.winner = event.winner;
          result.events.push(line);
          break;
        case "tie":
          result.finished = true;
          result.tie = true;
          result.events.push(line);
          break;
        default:
          result.events.push(line);
      }
      return true;
    }

    if (event.kind === "turn" && event.turn !== undefined) result.turn = event.turn;
    if (event.kind === "error") result.error = event.message;
    result.events.push(line);
    return false;
  });

  return result;
}

const REQUEST_ONLY: ReadonlySet<BattleEventKind> = new Set(["request"]);
const REQUEST_OR_END: ReadonlySet<BattleEventKind> = new Set(["request", "win", "tie"]);

export async function waitForRequest(
  conn: Connection,
  battleId: string,
  timeoutMs: number,
  clock: Clock = Date.now
): Promise<RequestWait> {
  const { request, turn, error } = await waitFor(
    conn,
    battleId,
    clock() + timeoutMs,
    REQUEST_ONLY,
    clock
  );
  return { request, turn, error };
}

export function waitForRequestWithEvents(
  conn: Connection,
  battleId: string,
  timeoutMs: number,
  clock: Clock = Date.now
): Promise<EventLogWait> {
  return waitFor(conn, battleId, clock() + timeoutMs, REQUEST_OR_END, clock);
}

export async function waitForChallstr(
  conn: Connection
): Promise<{ clientId: string; challstr: string }> {
  for (;;) {
    const frame = await conn.receive();
    if (frame === null) continue;
    for (const { room, line } of demux(frame)) {
      if (room !== "" || commandOf(line) !== "challstr") continue;
      const event = classify(room, line);
      if (event.kind === "challstr") {
        return { clientId: event.clientId, challstr: event.challstr };
      }
    }
  }
}

/**
 * Waits for `|init|battle` in any room. The title normally follows in the
 * same frame; if that frame ends without one the battle is returned untitled
 * rather than waiting on.
 */
export async function waitForBattleStart(
  conn: Connection,
  timeoutMs: number,
  clock: Clock = Date.now
): Promise<BattleStart> {
  const seen: { start: BattleStart | null } = { start: null };

  const found = await receiveUntil(
    conn,
    clock() + timeoutMs,
    clock,
    (room, line) => {
      // Other rooms' payloads are never decoded here.
      const command = commandOf(line);
      if (command !== "init" && command !== "title") return false;
      const event = classify(room, line);
      if (event.kind === "init") {
        seen.start = { battleId: room, title: null };
        return false;
      }
      if (seen.start && room === seen.start.battleId && event.kind === "title") {
        seen.start.title = event.text;
        return true;
      }
      return false;
    },
    () => seen.start !== null
  );

  if (!found || !seen.start) {
    throw new TimeoutError("timed out waiting for battle to start");
  }
  return seen.start;
}
