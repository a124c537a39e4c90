import { expect } from "chai";
import pino from "pino";
import { createAuthenticator, type FetchLike } from "../services/showdown-client/src/auth/login";
import { AuthenticationError } from "../services/showdown-client/src/infra/errors";
import { rejectionOf } from "./helpers/scriptedConnection";

type Call = { url: string; body: URLSearchParams };

function fakeFetch(status: number, text: string) {
  const calls: Call[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, body: new URLSearchParams(init.body) });
    return { ok: status >= 200 && status < 300, status, text: async () => text };
  };
  return { fetch, calls };
}

const challenge = { clientId: "4", challstr: "abc123" };
const log = pino({ level: "silent" });

describe("createAuthenticator", () => {
  it("gets a guest assertion without a password", async () => {
    const { fetch, calls } = fakeFetch(200, "guest-assertion\n");
    const authenticate = createAuthenticator({ loginServer: "http://login.test", log, fetch });

    const result = await authenticate({ username: "TestUser", password: null }, challenge);

    expect(result).to.deep.equal({ assertion: "guest-assertion", userId: "TestUser" });
    expect(calls).to.have.length(1);
    expect(calls[0]?.url).to.equal("http://login.test/action.php");
    expect(Object.fromEntries(calls[0]?.body ?? [])).to.deep.equal({
      act: "getassertion",
      userid: "TestUser",
      challstr: "4|abc123",
    });
  });

  it("rejects a refused guest name", async () => {
    const { fetch } = fakeFetch(200, ";;Your name is taken");
    const authenticate = createAuthenticator({ loginServer: "http://login.test", log, fetch });
    const err = await rejectionOf(authenticate({ username: "TestUser", password: null }, challenge));
    expect(err).to.be.instanceOf(AuthenticationError);
  });

  it("logs in with a password and reports the server's user id", async () => {
    const body = JSON.stringify({
      actionsuccess: true,
      assertion: "signed-assertion",
      curuser: { loggedin: true, username: "Test User", userid: "testuser" },
    });
    const { fetch, calls } = fakeFetch(200, `]${body}`);
    const authenticate = createAuthenticator({ loginServer: "http://login.test", log, fetch });

    const result = await authenticate({ username: "Test User", password: "test-secret" }, challenge);

    expect(result).to.deep.equal({ assertion: "signed-assertion", userId: "testuser" });
    expect(calls[0]?.url).to.equal("http://login.test/api/login");
    expect(Object.fromEntries(calls[0]?.body ?? [])).to.deep.equal({
      name: "Test User",
      pass: "test-secret",
      challstr: "4|abc123",
    });
  });

  it("fails when the login is not successful", async () => {
    const { fetch } = fakeFetch(200, `]${JSON.stringify({ actionsuccess: false, assertion: ";" })}`);
    const authenticate = createAuthenticator({ loginServer: "http://login.test", log, fetch });
    const err = await rejectionOf(
      authenticate({ username: "TestUser", password: "test-secret" }, challenge)
    );
    expect(err).to.be.instanceOf(AuthenticationError);
    expect(err.message).to.match(/^could not log in: /);
  });

  it("fails on an HTTP error", async () => {
    const { fetch } = fakeFetch(503, "unavailable");
    const authenticate = createAuthenticator({ loginServer: "http://login.test", log, fetch });
    const err = await rejectionOf(authenticate({ username: "TestUser", password: null }, challenge));
    expect(err).to.be.instanceOf(AuthenticationError);
    expect(err.message).to.equal("could not get assertion (HTTP 503)");
  });

  it("fails on a body that is not JSON", async () => {
    const { fetch } = fakeFetch(200, "]<html>");
    const authenticate = createAuthenticator({ loginServer: "http://login.test", log, fetch });
    const err = await rejectionOf(
      authenticate({ username: "TestUser", password: "test-secret" }, challenge)
    );
    expect(err.message).to.equal("login response is not JSON");
  });
});
