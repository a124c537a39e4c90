import { ConfigurationError, TimeoutError } from "../../infra/errors";
import { deriveOptions, type OptionsView } from "../../protocol/options";
import { choose, normalizeChoice } from "../../protocol/outbound";
import { requestIdOf, type RequestSnapshot } from "../../protocol/request";
import {
  waitForRequest,
  waitForRequestWithEvents,
  type RequestWait,
} from "../../protocol/waits";
import type { ClientContext } from "../context";
import { withSession } from "../session";
import { resolveBattleId } from "./observe";

export type ActParams = {
  battleId?: string;
  choice: string;
  rqid?: number;
  refresh: boolean;
  timeoutS: number;
  postTimeoutS: number;
};

export type ActResult = {
  battleId: string;
  sent: string;
  rqid: number;
  error: string | null;
  turn: number | null;
  request: RequestSnapshot | null;
  options: OptionsView;
  events: string[];
  finished: boolean;
  winner: string | null;
  tie: boolean;
  statePath: string;
};

export async function runAct(ctx: ClientContext, params: ActParams): Promise<ActResult> {
  const clock = ctx.clock ?? Date.now;
  const command = normalizeChoice(params.choice);
  const persisted = await ctx.store.load();
  const battleId = resolveBattleId(params.battleId, persisted);
  // The saved rqid is only trusted when no fresh request is polled for.
  const knownRqid = params.refresh ? params.rqid ?? null : params.rqid ?? persisted.rqid ?? null;

  if (!params.refresh && knownRqid === null) {
    throw new ConfigurationError("rqid is required when refresh is disabled");
  }

  const outcome = await withSession(ctx, async (session) => {
    await session.join(battleId);

    let current: RequestWait = { request: null, turn: null, error: null };
    let rqid = knownRqid;
    if (params.refresh) {
      current = await waitForRequest(session.conn, battleId, params.timeoutS * 1000, clock);
      // A request without an rqid (e.g. `wait`) has nothing to answer.
      rqid = current.request ? requestIdOf(current.request) : knownRqid;
    }
    if (rqid === null) {
      throw new TimeoutError("timed out waiting for a request to answer");
    }

    await session.send(choose(battleId, command, rqid));
    ctx.log.info({ battleId, command, rqid }, "choice submitted");

    const next = await waitForRequestWithEvents(
      session.conn,
      battleId,
      params.postTimeoutS * 1000,
      clock
    );
    if (next.error) ctx.log.warn({ battleId, error: next.error }, "server rejected choice");
    return { current, rqid, next };
  });

  const { current, rqid, next } = outcome;

  await ctx.store.merge(
    {
      websocketUri: ctx.config.websocketUri,
      username: ctx.config.username,
      password: ctx.config.password,
      battleId,
      rqid: requestIdOf(next.request) ?? rqid,
      turn: next.turn ?? current.turn,
      request: next.request ?? current.request,
      finished: next.finished,
      winner: next.winner,
      tie: next.tie,
    },
    clock()
  );

  return {
    battleId,
    sent: command,
    rqid,
    error: next.error ?? current.error,
    turn: next.turn,
    request: next.request,
    options: deriveOptions(next.request),
    events: next.events,
    finished: next.finished,
    winner: next.winner,
    tie: next.tie,
    statePath: ctx.store.path,
  };
}
