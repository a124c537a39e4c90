import { deriveOptions, type OptionsView } from "../../protocol/options";
import { searchBattle, setTeam, timerOn } from "../../protocol/outbound";
import { requestIdOf, type RequestSnapshot } from "../../protocol/request";
import { waitForBattleStart, waitForRequest } from "../../protocol/waits";
import type { ClientContext } from "../context";
import { withSession } from "../session";

export type StartParams = {
  format: string;
  team: string | null;
  startTimeoutS: number;
  requestTimeoutS: number;
};

export type StartResult = {
  battleId: string;
  title: string | null;
  turn: number | null;
  rqid: number | null;
  error: string | null;
  request: RequestSnapshot | null;
  options: OptionsView;
  statePath: string;
};

export async function runStart(
  ctx: ClientContext,
  params: StartParams
): Promise<StartResult> {
  const clock = ctx.clock ?? Date.now;

  const outcome = await withSession(ctx, async (session) => {
    await session.send(setTeam(params.team));
    await session.send(searchBattle(params.format));
    ctx.log.info({ format: params.format, user: session.username }, "searching for battle");

    const start = await waitForBattleStart(session.conn, params.startTimeoutS * 1000, clock);
    ctx.log.info(start, "battle started");
    await session.send(timerOn(start.battleId));

    const wait = await waitForRequest(
      session.conn,
      start.battleId,
      params.requestTimeoutS * 1000,
      clock
    );
    return { start, wait };
  });

  const { start, wait } = outcome;
  const rqid = requestIdOf(wait.request);

  await ctx.store.merge(
    {
      websocketUri: ctx.config.websocketUri,
      username: ctx.config.username,
      password: ctx.config.password,
      battleId: start.battleId,
      rqid,
      turn: wait.turn,
      request: wait.request,
      finished: false,
      winner: null,
      tie: false,
    },
    clock()
  );

  return {
    battleId: start.battleId,
    title: start.title,
    turn: wait.turn,
    rqid,
    error: wait.error,
    request: wait.request,
    options: deriveOptions(wait.request),
    statePath: ctx.store.path,
  };
}
