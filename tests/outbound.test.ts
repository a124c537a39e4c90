import { expect } from "chai";
import { ConfigurationError } from "../services/showdown-client/src/infra/errors";
import {
  choose,
  joinRoom,
  normalizeChoice,
  rename,
  searchBattle,
  setTeam,
  timerOn,
} from "../services/showdown-client/src/protocol/outbound";

describe("outbound messages", () => {
  it("scopes global commands to the empty room", () => {
    expect(joinRoom("battle-gen9ou-1")).to.equal("|/join battle-gen9ou-1");
    expect(searchBattle("gen9randombattle")).to.equal("|/search gen9randombattle");
    expect(rename("TestUser", "test-assertion")).to.equal("|/trn TestUser,0,test-assertion");
  });

  it("sends None when there is no team", () => {
    expect(setTeam(null)).to.equal("|/utm None");
    expect(setTeam("Pikachu||lightball|")).to.equal("|/utm Pikachu||lightball|");
  });

  it("scopes battle commands to the battle room", () => {
    expect(timerOn("battle-1")).to.equal("battle-1|/timer on");
    expect(choose("battle-1", "/choose move 1", 5)).to.equal("battle-1|/choose move 1|5");
  });

  it("normalizes choices", () => {
    expect(normalizeChoice("  move 1 terastallize ")).to.equal("/choose move 1 terastallize");
    expect(normalizeChoice("/choose switch 3")).to.equal("/choose switch 3");
    expect(() => normalizeChoice("   ")).to.throw(ConfigurationError, "choice must be non-empty");
  });
});
