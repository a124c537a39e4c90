import { normalizeRequest, type RequestSnapshot } from "./request";

export type MoveChoice = {
  slot: number;
  id: string | null;
  name: string | null;
  pp: number | null;
  maxpp: number | null;
  target: string | null;
};

export type SwitchChoice = {
  slot: number;
  ident: string | null;
  details: string | null;
  condition: string;
};

export type OptionsView = {
  moves: MoveChoice[];
  switches: SwitchChoice[];
  canTerastallize: string | null;
  trapped: boolean;
  forceSwitch: boolean;
  wait: boolean;
};

const FAINTED_MARKER = "fnt";

function emptyOptions(): OptionsView {
  return {
    moves: [],
    switches: [],
    canTerastallize: null,
    trapped: false,
    forceSwitch: false,
    wait: false,
  };
}

// Singles send `forceSwitch: [true]`; doubles send one flag per active slot.
function isForcedSwitch(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(Boolean);
  return Boolean(value);
}

/**
 * Legal actions for the request. Slot numbers index the server's own move
 * and team arrays, so `move 3` / `switch 4` stay valid after disabled moves,
 * the active pokemon and fainted pokemon are filtered out.
 */
export function deriveOptions(snapshot: RequestSnapshot | null): OptionsView {
  const options = emptyOptions();
  if (!snapshot) return options;

  if (snapshot.wait === true) {
    options.wait = true;
    return options;
  }

  const request = normalizeRequest(snapshot);
  const active = request.active?.[0] ?? null;

  if (active) {
    if (active.canTerastallize !== undefined) {
      options.canTerastallize = active.canTerastallize;
    }
    options.trapped = Boolean(active.trapped);
  }

  options.forceSwitch = isForcedSwitch(request.forceSwitch);

  active?.moves?.forEach((move, index) => {
    if (!move || move.disabled) return;
    options.moves.push({
      slot: index + 1,
      id: move.id ?? null,
      name: move.move ?? null,
      pp: move.pp ?? null,
      maxpp: move.maxpp ?? null,
      target: move.target ?? null,
    });
  });

  request.side?.pokemon?.forEach((pokemon, index) => {
    if (!pokemon || pokemon.active) return;
    const condition = pokemon.condition ?? "";
    if (condition.includes(FAINTED_MARKER)) return;
    options.switches.push({
      slot: index + 1,
      ident: pokemon.ident ?? null,
      details: pokemon.details ?? null,
      condition,
    });
  });

  return options;
}
