import { z } from "zod";
import type { Logger } from "pino";
import { AuthenticationError } from "../infra/errors";

export type Challenge = {
  clientId: string;
  challstr: string;
};

export type Credentials = {
  username: string;
  password: string | null;
};

export type LoginResult = {
  assertion: string;
  userId: string;
};

export type Authenticator = (
  credentials: Credentials,
  challenge: Challenge
) => Promise<LoginResult>;

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export interface LoginConfig {
  loginServer: string;
  log: Logger;
  fetch?: FetchLike;
}

const LoginResponseSchema = z.object({
  actionsuccess: z.unknown(),
  assertion: z.string().min(1),
  curuser: z.object({ userid: z.string().min(1) }).partial().optional(),
});

// api/login prefixes its JSON body with "]".
const JSON_GUARD = "]";

function parseLoginResponse(text: string) {
  const body = text.startsWith(JSON_GUARD) ? text.slice(JSON_GUARD.length) : text;
  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch (err) {
    throw new AuthenticationError("login response is not JSON", { cause: err });
  }
  const parsed = LoginResponseSchema.safeParse(value);
  if (!parsed.success || !parsed.data.actionsuccess) {
    throw new AuthenticationError(`could not log in: ${body}`);
  }
  return parsed.data;
}

export function createAuthenticator(config: LoginConfig): Authenticator {
  const doFetch: FetchLike = config.fetch ?? fetch;

  async function post(endpoint: string, form: Record<string, string>) {
    const url = new URL(endpoint, config.loginServer).toString();
    let resp: Awaited<ReturnType<FetchLike>>;
    try {
      resp = await doFetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams(form).toString(),
      });
    } catch (err) {
      throw new AuthenticationError("login server unreachable", { cause: err });
    }
    if (!resp.ok) {
      throw new AuthenticationError(`could not get assertion (HTTP ${resp.status})`);
    }
    return resp.text();
  }

  return async (credentials, challenge) => {
    const challstr = `${challenge.clientId}|${challenge.challstr}`;

    if (credentials.password === null) {
      config.log.debug({ username: credentials.username }, "requesting guest assertion");
      const assertion = (
        await post("/action.php", {
          act: "getassertion",
          userid: credentials.username,
          challstr,
        })
      ).trim();
      // ";" and ";;message" are the server's refusals.
      if (!assertion || assertion.startsWith(";")) {
        throw new AuthenticationError(
          `could not get assertion for ${credentials.username}: ${assertion || "empty response"}`
        );
      }
      return { assertion, userId: credentials.username };
    }

    config.log.debug({ username: credentials.username }, "logging in");
    const response = parseLoginResponse(
      await post("/api/login", {
        name: credentials.username,
        pass: credentials.password,
        challstr,
      })
    );
    return {
      assertion: response.assertion,
      userId: response.curuser?.userid ?? credentials.username,
    };
  };
}
