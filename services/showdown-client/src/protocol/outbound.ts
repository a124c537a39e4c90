import { ConfigurationError } from "../infra/errors";

const CHOOSE_PREFIX = "/choose ";

export function roomMessage(room: string, parts: string[]): string {
  return [room, ...parts].join("|");
}

export const joinRoom = (room: string) => roomMessage("", [`/join ${room}`]);

export const setTeam = (packedTeam: string | null) =>
  roomMessage("", [`/utm ${packedTeam ?? "None"}`]);

export const searchBattle = (format: string) =>
  roomMessage("", [`/search ${format}`]);

export const rename = (username: string, assertion: string) =>
  roomMessage("", [`/trn ${username},0,${assertion}`]);

export const timerOn = (battleId: string) => roomMessage(battleId, ["/timer on"]);

export function choose(battleId: string, command: string, rqid: number): string {
  return roomMessage(battleId, [command, String(rqid)]);
}

/** Accepts `move 1` as well as `/choose move 1`. */
export function normalizeChoice(choice: string): string {
  const trimmed = choice.trim();
  if (!trimmed) {
    throw new ConfigurationError("choice must be non-empty");
  }
  return trimmed.startsWith(CHOOSE_PREFIX) ? trimmed : CHOOSE_PREFIX + trimmed;
}
