#!/usr/bin/env node
import { createAuthenticator } from "./auth/login";
import { parseCli, USAGE } from "./cli/args";
import { loadEnv } from "./config/env";
import { expandHome, resolveSessionConfig } from "./core/config";
import type { ClientContext } from "./core/context";
import { runAct } from "./core/operations/act";
import { runObserve } from "./core/operations/observe";
import { runStart } from "./core/operations/start";
import { ConfigurationError } from "./infra/errors";
import { createLogger } from "./infra/logger";
import { SessionStore } from "./state/sessionStore";
import { createWsConnector } from "./transport/connection";

async function main() {
  const env = loadEnv();
  const log = createLogger(env.LOG_LEVEL);
  const cli = parseCli(process.argv.slice(2));

  const store = new SessionStore(expandHome(cli.statePath ?? env.PS_STATE_PATH));
  const config = resolveSessionConfig(cli.identity, env, await store.load());
  const ctx: ClientContext = {
    config,
    store,
    connect: createWsConnector(log),
    authenticate: createAuthenticator({ loginServer: config.loginServer, log }),
    log,
  };

  log.debug({ command: cli.command, statePath: store.path }, "running command");
  switch (cli.command) {
    case "start":
      return runStart(ctx, cli.params);
    case "observe":
      return runObserve(ctx, cli.params);
    case "act":
      return runAct(ctx, cli.params);
  }
}

main()
  .then((result) => {
    process.stdout.write(`${JSON.stringify(result)}\n`);
  })
  .catch((err: unknown) => {
    const error = err instanceof Error ? err : new Error(String(err));
    process.stdout.write(`${JSON.stringify({ error: error.message, type: error.name })}\n`);
    if (err instanceof ConfigurationError) {
      process.stderr.write(`${USAGE}\n`);
    }
    process.exitCode = 1;
  });
