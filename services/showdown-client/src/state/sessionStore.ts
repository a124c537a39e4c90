import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { RequestSnapshot } from "../protocol/request";

export type SessionState = {
  websocketUri: string;
  username: string;
  password: string | null;
  battleId: string;
  rqid: number | null;
  turn: number | null;
  request: RequestSnapshot | null;
  finished: boolean;
  winner: string | null;
  tie: boolean;
  updatedAt: number;
};

// Only the fields read back are typed; anything else in the file, including
// keys written by other tools, rides along untouched.
const PersistedStateSchema = z
  .object({
    websocketUri: z.string().min(1).optional().catch(undefined),
    username: z.string().min(1).optional().catch(undefined),
    password: z.string().nullable().optional().catch(undefined),
    battleId: z.string().min(1).optional().catch(undefined),
    rqid: z.number().int().nullable().optional().catch(undefined),
  })
  .passthrough();

export type PersistedState = z.infer<typeof PersistedStateSchema>;

export class SessionStore {
  constructor(readonly path: string) {}

  async load(): Promise<PersistedState> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
      throw err;
    }
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch {
      return {};
    }
    const parsed = PersistedStateSchema.safeParse(value);
    return parsed.success ? parsed.data : {};
  }

  async merge(
    patch: Partial<Omit<SessionState, "updatedAt">>,
    now: number = Date.now()
  ): Promise<PersistedState> {
    const next: PersistedState = { ...(await this.load()), ...patch, updatedAt: now };
    await this.write(next);
    return next;
  }

  private async write(state: PersistedState) {
    const sorted = Object.fromEntries(
      Object.entries(state).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    );
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmp, `${JSON.stringify(sorted, null, 2)}\n`, "utf8");
    await rename(tmp, this.path);
  }
}
