import { homedir } from "node:os";
import { join } from "node:path";
import type { AppEnv } from "../config/env";
import { ConfigurationError } from "../infra/errors";
import type { PersistedState } from "../state/sessionStore";

export type SessionConfig = Readonly<{
  websocketUri: string;
  username: string;
  password: string | null;
  loginServer: string;
  renameSettleMs: number;
}>;

export type IdentityFlags = {
  websocketUri?: string;
  username?: string;
  password?: string;
};

export function resolveSessionConfig(
  flags: IdentityFlags,
  env: AppEnv,
  persisted: PersistedState
): SessionConfig {
  const username = flags.username ?? env.PS_USERNAME ?? persisted.username;
  const websocketUri =
    flags.websocketUri ?? env.PS_WEBSOCKET_URI ?? persisted.websocketUri;
  const password = flags.password ?? env.PS_PASSWORD ?? persisted.password ?? null;

  if (!username) {
    throw new ConfigurationError("username is required (flag, PS_USERNAME or state)");
  }
  if (!websocketUri) {
    throw new ConfigurationError(
      "websocket uri is required (flag, PS_WEBSOCKET_URI or state)"
    );
  }

  return Object.freeze({
    websocketUri,
    username,
    password,
    loginServer: env.PS_LOGIN_SERVER,
    renameSettleMs: env.PS_RENAME_SETTLE_MS,
  });
}

export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}
