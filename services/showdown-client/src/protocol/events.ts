import { ProtocolDecodeError } from "../infra/errors";
import { isJsonObject, type RequestSnapshot } from "./request";

export type BattleEvent =
  | { kind: "challstr"; clientId: string; challstr: string }
  | { kind: "init" }
  | { kind: "title"; text: string }
  | { kind: "request"; payload: RequestSnapshot }
  | { kind: "turn"; turn?: number }
  | { kind: "error"; message: string }
  | { kind: "win"; winner: string }
  | { kind: "tie" }
  | { kind: "other"; raw: string };

export type BattleEventKind = BattleEvent["kind"];

export function commandOf(line: string): string {
  return line.split("|")[1] ?? "";
}

// Everything after the command, with any further pipes kept intact.
function rest(segments: string[], from: number): string {
  return segments.slice(from).join("|");
}

function parseTurn(value: string): number | undefined {
  if (!/^\s*[+-]?\d+\s*$/.test(value)) return undefined;
  return Number.parseInt(value, 10);
}

function parseRequestPayload(room: string, text: string): RequestSnapshot {
  if (!text) return {};
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new ProtocolDecodeError(`malformed request payload in room "${room}"`, {
      cause: err,
    });
  }
  if (!isJsonObject(value)) {
    throw new ProtocolDecodeError(
      `request payload in room "${room}" is not a JSON object`
    );
  }
  return value;
}

export function classify(room: string, line: string): BattleEvent {
  const segments = line.split("|");
  const command = segments[1] ?? "";
  const arg = segments[2] ?? "";

  switch (command) {
    case "challstr":
      return { kind: "challstr", clientId: arg, challstr: rest(segments, 3) };
    case "init":
      return arg === "battle" ? { kind: "init" } : { kind: "other", raw: line };
    case "title":
      return { kind: "title", text: rest(segments, 2) };
    case "win":
      return { kind: "win", winner: arg };
    case "tie":
      return { kind: "tie" };
    case "error":
      return { kind: "error", message: rest(segments, 2) };
    case "turn": {
      const turn = parseTurn(arg);
      return turn === undefined ? { kind: "turn" } : { kind: "turn", turn };
    }
    case "request":
      return { kind: "request", payload: parseRequestPayload(room, rest(segments, 2)) };
    default:
      return { kind: "other", raw: line };
  }
}
