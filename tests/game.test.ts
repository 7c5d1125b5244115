import { describe, expect, it } from "vitest";
import {
  Die,
  Game,
  InvalidFormError,
  InvalidRollCountError,
  UnrollableWeightsError,
  createRng,
  sequenceRng,
  type ShowForm,
} from "../src/index";
import { captureLogs, silentLogger } from "./helpers/logs";

function scriptedGame() {
  // cumulative [1, 2, 3] with total 3
  const first = new Die(["1", "2", "3"], { rng: sequenceRng([0.1, 0.5, 0.9]) });
  const second = new Die(["1", "2", "3"], { rng: sequenceRng([0.9]) });
  return new Game([first, second], { logger: silentLogger });
}

describe("Game", () => {
  describe("before any play", () => {
    it("shows an empty wide table", () => {
      const game = new Game([new Die([1, 2])], { logger: silentLogger });
      expect(game.show()).toEqual({ index: [], columns: [], rows: [] });
      expect(game.numRolls).toBe(0);
    });

    it("shows an empty narrow table", () => {
      const game = new Game([new Die([1, 2])], { logger: silentLogger });
      expect(game.show("narrow")).toEqual([]);
    });
  });

  describe("play", () => {
    it("builds one row per roll and one column per die", () => {
      const faces = ["1", "2", "3"];
      const game = new Game([new Die(faces), new Die(faces)], { logger: silentLogger });
      game.play(3);

      const wide = game.show("wide");
      expect(wide.rows).toHaveLength(3);
      expect(wide.columns).toEqual(["die_0", "die_1"]);
      expect(wide.index).toEqual([0, 1, 2]);
      for (const row of wide.rows) expect(row).toHaveLength(2);
      expect(game.show("narrow")).toHaveLength(6);
    });

    it("rolls each die in order, one draw at a time", () => {
      const game = scriptedGame();
      game.play(3);
      expect(game.show().rows).toEqual([
        ["1", "3"],
        ["2", "3"],
        ["3", "3"],
      ]);
    });

    it("lets the same die appear more than once", () => {
      const die = new Die(["x", "y"], { rng: sequenceRng([0.1, 0.9]) });
      const game = new Game([die, die], { logger: silentLogger });
      game.play(2);
      // die_0 takes draws 1-2, die_1 draws 3-4
      expect(game.show().rows).toEqual([
        ["x", "x"],
        ["y", "y"],
      ]);
    });

    it("replaces earlier results instead of appending", () => {
      const game = new Game([new Die([1, 2, 3], { rng: createRng(5) })], { logger: silentLogger });
      game.play(5);
      game.play(2);
      expect(game.numRolls).toBe(2);
      expect(game.show().index).toEqual([0, 1]);
    });

    it("keeps the previous results when the roll count is invalid", () => {
      const game = scriptedGame();
      game.play(3);
      expect(() => game.play(-2)).toThrow(InvalidRollCountError);
      expect(() => game.play(2.5)).toThrow(InvalidRollCountError);
      expect(game.numRolls).toBe(3);
    });

    it("keeps the previous results when a die cannot be rolled", () => {
      const good = new Die(["a", "b"], { rng: createRng(1) });
      const bad = new Die(["a", "b"], { rng: createRng(2) });
      const game = new Game([good, bad], { logger: silentLogger });
      game.play(3);

      bad.setWeight("a", 0);
      bad.setWeight("b", 0);
      expect(() => game.play(4)).toThrow(UnrollableWeightsError);
      expect(game.numRolls).toBe(3);
    });

    it("keeps die columns for zero rolls", () => {
      const game = new Game([new Die([1, 2])], { logger: silentLogger });
      game.play(0);
      expect(game.show()).toEqual({ index: [], columns: ["die_0"], rows: [] });
    });

    it("produces an empty table without dice", () => {
      const game = new Game([], { logger: silentLogger });
      game.play(5);
      expect(game.show()).toEqual({ index: [], columns: [], rows: [] });
      expect(game.show("narrow")).toEqual([]);
    });

    it("holds its own copy of the dice list", () => {
      const dice = [new Die<number>([1, 2])];
      const game = new Game(dice, { logger: silentLogger });
      dice.push(new Die([3, 4]));
      expect(game.dice).toHaveLength(1);
    });

    it("logs each play at debug level", () => {
      const { logger, lines } = captureLogs();
      const game = new Game([new Die([1]), new Die([1])], { logger });
      game.play(3);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 20,
        name: "montecarlo",
        tag: "game:play",
        dice: 2,
        numRolls: 3,
      });
    });
  });

  describe("show", () => {
    it("reshapes to narrow form roll by roll, die by die", () => {
      const game = scriptedGame();
      game.play(3);
      expect(game.show("narrow")).toEqual([
        { roll: 0, die: "die_0", outcome: "1" },
        { roll: 0, die: "die_1", outcome: "3" },
        { roll: 1, die: "die_0", outcome: "2" },
        { roll: 1, die: "die_1", outcome: "3" },
        { roll: 2, die: "die_0", outcome: "3" },
        { roll: 2, die: "die_1", outcome: "3" },
      ]);
    });

    it("holds the same outcomes in both forms", () => {
      const faces = [1, 2, 3, 4, 5, 6];
      const game = new Game(
        [new Die(faces, { rng: createRng(8) }), new Die(faces, { rng: createRng(9) })],
        { logger: silentLogger }
      );
      game.play(20);
      const wideValues = game.show("wide").rows.flat();
      const narrowValues = game.show("narrow").map((row) => row.outcome);
      expect(narrowValues).toEqual(wideValues);
    });

    it("defaults to wide form", () => {
      const game = scriptedGame();
      game.play(2);
      expect(game.show()).toEqual(game.show("wide"));
    });

    it("returns copies that do not alias the results", () => {
      const game = scriptedGame();
      game.play(2);
      const a = game.show();
      const b = game.show();
      expect(a).not.toBe(b);
      expect(a.rows[0]).not.toBe(b.rows[0]);
    });

    it("rejects unknown forms with a value error", () => {
      const game = scriptedGame();
      game.play(2);
      const form: string = "invalid";
      expect(() => game.show(form as ShowForm)).toThrow(InvalidFormError);
      expect(() => game.show(form as ShowForm)).toThrow("Form must be 'wide' or 'narrow', got [invalid]");
    });

    it("rejects unknown forms before any play", () => {
      const game = new Game([], { logger: silentLogger });
      const form: string = "tall";
      expect(() => game.show(form as ShowForm)).toThrow(InvalidFormError);
    });
  });
});
