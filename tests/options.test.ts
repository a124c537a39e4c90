import { expect } from "chai";
import { deriveOptions } from "../services/showdown-client/src/protocol/options";

const DEFAULTS = {
  moves: [],
  switches: [],
  canTerastallize: null,
  trapped: false,
  forceSwitch: false,
  wait: false,
};

function move(id: string, extra: Record<string, unknown> = {}) {
  return { id, move: id.toUpperCase(), pp: 10, maxpp: 16, target: "normal", ...extra };
}

describe("deriveOptions", () => {
  it("returns the defaults for no request or an empty one", () => {
    expect(deriveOptions(null)).to.deep.equal(DEFAULTS);
    expect(deriveOptions({})).to.deep.equal(DEFAULTS);
  });

  it("ignores everything else on a wait request", () => {
    const options = deriveOptions({
      wait: true,
      forceSwitch: [true],
      active: [{ trapped: true, canTerastallize: "Fire", moves: [move("tackle")] }],
      side: { pokemon: [{ ident: "p1: A", condition: "100/100" }] },
    });
    expect(options).to.deep.equal({ ...DEFAULTS, wait: true });
  });

  it("keeps original slot numbers when disabled moves are skipped", () => {
    const options = deriveOptions({
      active: [
        {
          moves: [
            move("a", { disabled: true }),
            move("b"),
            move("c", { disabled: true }),
            move("d"),
          ],
        },
      ],
    });
    expect(options.moves).to.deep.equal([
      { slot: 2, id: "b", name: "B", pp: 10, maxpp: 16, target: "normal" },
      { slot: 4, id: "d", name: "D", pp: 10, maxpp: 16, target: "normal" },
    ]);
  });

  it("offers only healthy benched pokemon as switches", () => {
    const options = deriveOptions({
      side: {
        pokemon: [
          { ident: "p1: P1", details: "Pikachu", condition: "100/100", active: true },
          { ident: "p1: P2", details: "Eevee, L50", condition: "100/100" },
          { ident: "p1: P3", details: "Ditto", condition: "0 fnt" },
        ],
      },
    });
    expect(options.switches).to.deep.equal([
      { slot: 2, ident: "p1: P2", details: "Eevee, L50", condition: "100/100" },
    ]);
  });

  it("reads terastallization and trapping from the first active entry only", () => {
    const options = deriveOptions({
      active: [{ canTerastallize: "Water", trapped: true }, { canTerastallize: "Fire" }],
    });
    expect(options.canTerastallize).to.equal("Water");
    expect(options.trapped).to.equal(true);
  });

  it("normalizes forceSwitch to a boolean", () => {
    expect(deriveOptions({ forceSwitch: true }).forceSwitch).to.equal(true);
    expect(deriveOptions({ forceSwitch: [false, true] }).forceSwitch).to.equal(true);
    expect(deriveOptions({ forceSwitch: [false] }).forceSwitch).to.equal(false);
    expect(deriveOptions({ forceSwitch: false }).forceSwitch).to.equal(false);
  });

  it("fills missing move and pokemon fields with null", () => {
    const options = deriveOptions({
      active: [{ moves: [{ id: "struggle" }] }],
      side: { pokemon: [{ active: false }] },
    });
    expect(options.moves).to.deep.equal([
      { slot: 1, id: "struggle", name: null, pp: null, maxpp: null, target: null },
    ]);
    expect(options.switches).to.deep.equal([
      { slot: 1, ident: null, details: null, condition: "" },
    ]);
  });

  it("does not throw on fields of the wrong type", () => {
    const options = deriveOptions({
      active: "nope",
      side: { pokemon: [42, { ident: "p1: B", condition: 7 }] },
      forceSwitch: "",
    });
    expect(options).to.deep.equal({
      ...DEFAULTS,
      switches: [{ slot: 2, ident: "p1: B", details: null, condition: "" }],
    });
  });

  it("derives the same view twice from the same request", () => {
    const request = {
      rqid: 3,
      active: [{ moves: [move("tackle")] }],
      side: { pokemon: [{ ident: "p1: A", condition: "50/100" }] },
    };
    expect(deriveOptions(request)).to.deep.equal(deriveOptions(request));
  });
});
