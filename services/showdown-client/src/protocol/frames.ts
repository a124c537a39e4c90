export type RoomLine = {
  room: string;
  line: string;
};

/**
 * Splits one raw websocket frame into the lines it carries, tagging each with
 * the room it belongs to. A `>roomid` header switches the room for every line
 * after it; lines before any header belong to the global room `""`.
 */
export function* demux(raw: string): Generator<RoomLine> {
  let room = "";
  for (const line of raw.split("\n")) {
    if (!line) continue;
    if (line.startsWith(">")) {
      room = line.slice(1);
      continue;
    }
    yield { room, line };
  }
}
