import { parseArgs } from "node:util";
import { z } from "zod";
import type { ActParams } from "../core/operations/act";
import type { ObserveParams } from "../core/operations/observe";
import type { StartParams } from "../core/operations/start";
import type { IdentityFlags } from "../core/config";
import { ConfigurationError } from "../infra/errors";

type Common = {
  identity: IdentityFlags;
  statePath?: string;
};

export type CliCommand =
  | (Common & { command: "start"; params: StartParams })
  | (Common & { command: "observe"; params: ObserveParams })
  | (Common & { command: "act"; params: ActParams });

export const USAGE = `usage: ps-client [--websocket-uri URI] [--username NAME] [--password PASS]
                 [--state-path FILE] <command> [options]

commands:
  start    --format FORMAT [--team PACKED] [--timeout-s 60] [--request-timeout-s 30]
  observe  [--battle-id ID] [--timeout-s 30]                       (alias: poll)
  act      --choice "move 1" [--battle-id ID] [--rqid N] [--timeout-s 15]
           [--no-refresh] [--post-timeout-s 30]                    (alias: choose)`;

const COMMAND_ALIASES: Record<string, CliCommand["command"]> = {
  start: "start",
  observe: "observe",
  poll: "observe",
  act: "act",
  choose: "act",
};

const seconds = (fallback: number) => z.coerce.number().positive().default(fallback);

const StartSchema = z.object({
  format: z.string({ required_error: "--format is required" }).min(1),
  team: z.string().nullable().default(null),
  timeoutS: seconds(60),
  requestTimeoutS: seconds(30),
});

const ObserveSchema = z.object({
  battleId: z.string().min(1).optional(),
  timeoutS: seconds(30),
});

const ActSchema = z.object({
  battleId: z.string().min(1).optional(),
  choice: z.string({ required_error: "--choice is required" }),
  rqid: z.coerce.number().int().optional(),
  noRefresh: z.boolean().default(false),
  timeoutS: seconds(15),
  postTimeoutS: seconds(30),
});

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigurationError(`invalid arguments: ${detail}`);
  }
  return parsed.data;
}

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        "websocket-uri": { type: "string" },
        username: { type: "string" },
        "ps-username": { type: "string" },
        password: { type: "string" },
        "ps-password": { type: "string" },
        "state-path": { type: "string" },
        format: { type: "string" },
        "pokemon-format": { type: "string" },
        team: { type: "string" },
        "timeout-s": { type: "string" },
        "request-timeout-s": { type: "string" },
        "battle-id": { type: "string" },
        choice: { type: "string" },
        rqid: { type: "string" },
        "no-refresh": { type: "boolean" },
        "post-timeout-s": { type: "string" },
      },
    });
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }
}

export function parseCli(argv: string[]): CliCommand {
  const { values, positionals } = readArgv(argv);
  const name = positionals[0];
  const command = name === undefined ? undefined : COMMAND_ALIASES[name];
  if (!command) {
    throw new ConfigurationError(
      name === undefined ? "missing command" : `unknown command "${name}"`
    );
  }

  const common: Common = {
    identity: {
      websocketUri: values["websocket-uri"],
      username: values.username ?? values["ps-username"],
      password: values.password ?? values["ps-password"],
    },
    statePath: values["state-path"],
  };

  switch (command) {
    case "start": {
      const opts = parseWith(StartSchema, {
        format: values.format ?? values["pokemon-format"],
        team: values.team,
        timeoutS: values["timeout-s"],
        requestTimeoutS: values["request-timeout-s"],
      });
      return {
        ...common,
        command,
        params: {
          format: opts.format,
          team: opts.team,
          startTimeoutS: opts.timeoutS,
          requestTimeoutS: opts.requestTimeoutS,
        },
      };
    }
    case "observe": {
      const opts = parseWith(ObserveSchema, {
        battleId: values["battle-id"],
        timeoutS: values["timeout-s"],
      });
      return { ...common, command, params: opts };
    }
    case "act": {
      const opts = parseWith(ActSchema, {
        battleId: values["battle-id"],
        choice: values.choice,
        rqid: values.rqid,
        noRefresh: values["no-refresh"],
        timeoutS: values["timeout-s"],
        postTimeoutS: values["post-timeout-s"],
      });
      return {
        ...common,
        command,
        params: {
          battleId: opts.battleId,
          choice: opts.choice,
          rqid: opts.rqid,
          refresh: !opts.noRefresh,
          timeoutS: opts.timeoutS,
          postTimeoutS: opts.postTimeoutS,
        },
      };
    }
  }
}
