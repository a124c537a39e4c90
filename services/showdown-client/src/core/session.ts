import { sleep } from "../infra/sleep";
import { joinRoom, rename } from "../protocol/outbound";
import { waitForChallstr } from "../protocol/waits";
import type { Connection } from "../transport/connection";
import type { ClientContext } from "./context";

export class BattleSession {
  constructor(
    readonly conn: Connection,
    readonly username: string,
    private readonly ctx: ClientContext
  ) {}

  async send(message: string) {
    this.ctx.log.debug({ message }, "sending");
    await this.conn.send(message);
  }

  async join(battleId: string) {
    await this.send(joinRoom(battleId));
    this.ctx.log.info({ battleId }, "joined battle room");
  }
}

async function login(ctx: ClientContext, conn: Connection): Promise<string> {
  const { config, log } = ctx;
  const challenge = await waitForChallstr(conn);
  log.debug({ clientId: challenge.clientId }, "received challstr");

  const { assertion, userId } = await ctx.authenticate(
    { username: config.username, password: config.password },
    challenge
  );
  await conn.send(rename(config.username, assertion));
  // The server answers /trn with |updateuser| a little later; nothing here reads it.
  if (config.renameSettleMs > 0) await sleep(config.renameSettleMs);

  log.info({ userId }, "logged in");
  return userId;
}

export async function withSession<T>(
  ctx: ClientContext,
  fn: (session: BattleSession) => Promise<T>
): Promise<T> {
  const conn = await ctx.connect(ctx.config.websocketUri);
  try {
    const username = await login(ctx, conn);
    return await fn(new BattleSession(conn, username, ctx));
  } finally {
    await conn.close().catch((err: unknown) => {
      ctx.log.warn({ err }, "failed to close connection");
    });
  }
}
