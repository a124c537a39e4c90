import type { Logger } from "pino";
import type { Authenticator } from "../auth/login";
import type { Clock } from "../protocol/waits";
import type { SessionStore } from "../state/sessionStore";
import type { Connector } from "../transport/connection";
import type { SessionConfig } from "./config";

export type ClientContext = {
  config: SessionConfig;
  store: SessionStore;
  connect: Connector;
  authenticate: Authenticator;
  log: Logger;
  clock?: Clock;
};
