import { ConfigurationError } from "../../infra/errors";
import { deriveOptions, type OptionsView } from "../../protocol/options";
import { requestIdOf, type RequestSnapshot } from "../../protocol/request";
import { waitForRequest } from "../../protocol/waits";
import type { PersistedState } from "../../state/sessionStore";
import type { ClientContext } from "../context";
import { withSession } from "../session";

export type ObserveParams = {
  battleId?: string;
  timeoutS: number;
};

export type ObserveResult = {
  battleId: string;
  turn: number | null;
  error: string | null;
  rqid: number | null;
  request: RequestSnapshot | null;
  options: OptionsView;
  statePath: string;
};

export function resolveBattleId(
  explicit: string | undefined,
  persisted: PersistedState
): string {
  const battleId = explicit || persisted.battleId;
  if (!battleId) {
    throw new ConfigurationError("battle id is required (flag or state)");
  }
  return battleId;
}

export async function runObserve(
  ctx: ClientContext,
  params: ObserveParams
): Promise<ObserveResult> {
  const clock = ctx.clock ?? Date.now;
  const battleId = resolveBattleId(params.battleId, await ctx.store.load());

  const wait = await withSession(ctx, async (session) => {
    await session.join(battleId);
    return waitForRequest(session.conn, battleId, params.timeoutS * 1000, clock);
  });
  const rqid = requestIdOf(wait.request);

  await ctx.store.merge(
    {
      websocketUri: ctx.config.websocketUri,
      username: ctx.config.username,
      password: ctx.config.password,
      battleId,
      rqid,
      turn: wait.turn,
      request: wait.request,
    },
    clock()
  );

  return {
    battleId,
    turn: wait.turn,
    error: wait.error,
    rqid,
    request: wait.request,
    options: deriveOptions(wait.request),
    statePath: ctx.store.path,
  };
}
