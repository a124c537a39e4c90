import { z } from "zod";

/**
 * Decoded `|request|` payload, kept exactly as the server sent it so it can be
 * echoed into results and persisted state. Read it through
 * {@link normalizeRequest}.
 */
export type RequestSnapshot = { [key: string]: unknown };

// A field of the wrong type degrades to absent instead of failing the parse.
const lenient = <T extends z.ZodTypeAny>(schema: T) =>
  schema.optional().catch(undefined);

const MoveOptionSchema = z.object({
  id: lenient(z.string()),
  move: lenient(z.string()),
  pp: lenient(z.number()),
  maxpp: lenient(z.number()),
  target: lenient(z.string()),
  disabled: z.unknown(),
});

const ActiveOptionSchema = z.object({
  moves: lenient(z.array(MoveOptionSchema.nullable().catch(null))),
  trapped: z.unknown(),
  canTerastallize: lenient(z.string().nullable()),
});

const PokemonSlotSchema = z.object({
  ident: lenient(z.string()),
  details: lenient(z.string()),
  condition: lenient(z.string()),
  active: z.unknown(),
});

// Array entries that are not objects become null so positions are preserved.
const NormalizedRequestSchema = z.object({
  wait: z.unknown(),
  forceSwitch: z.unknown(),
  active: lenient(z.array(ActiveOptionSchema.nullable().catch(null))),
  side: lenient(
    z.object({
      pokemon: lenient(z.array(PokemonSlotSchema.nullable().catch(null))),
    })
  ),
});

export type MoveOption = z.infer<typeof MoveOptionSchema>;
export type ActiveOption = z.infer<typeof ActiveOptionSchema>;
export type PokemonSlot = z.infer<typeof PokemonSlotSchema>;
export type NormalizedRequest = z.infer<typeof NormalizedRequestSchema>;

export function normalizeRequest(snapshot: RequestSnapshot): NormalizedRequest {
  return NormalizedRequestSchema.parse(snapshot);
}

export function isJsonObject(value: unknown): value is RequestSnapshot {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function requestIdOf(snapshot: RequestSnapshot | null): number | null {
  const rqid = snapshot?.rqid;
  return typeof rqid === "number" && Number.isInteger(rqid) ? rqid : null;
}
