import { describe, it, expect } from "vitest";
import { Board } from "../Board";
import { cell, cellsToTuples } from "../Cell";
import { ConfigError, ContradictionError, InvalidMoveError } from "../Errors";
import { GameSession } from "../GameSession";
import { KnowledgeBase } from "../KnowledgeBase";
import { MinesweeperAgent } from "../Agent";
import { mulberry32 } from "../Random";

describe("KnowledgeBase - mark propagation", () => {
  it("1) declareMine shrinks every sentence mentioning the cell", () => {
    const kb = new KnowledgeBase(1, 4);
    kb.addSentence([cell(0, 0), cell(0, 1), cell(0, 2)], 2);
    kb.addSentence([cell(0, 2), cell(0, 3)], 1);
    kb.declareMine(cell(0, 2));
    expect(kb.sentences.map(String)).toEqual(["{(0, 0), (0, 1)} = 1", "{(0, 3)} = 0"]);
  });

  it("2) declaring a cell twice reports no change", () => {
    const kb = new KnowledgeBase(2, 2);
    expect(kb.declareSafe(cell(0, 0))).toBe(true);
    expect(kb.declareSafe(cell(0, 0))).toBe(false);
    expect(kb.declareMine(cell(1, 1))).toBe(true);
    expect(kb.declareMine(cell(1, 1))).toBe(false);
  });

  it("3) a cell cannot be both safe and a mine", () => {
    const kb = new KnowledgeBase(2, 2);
    kb.declareSafe(cell(0, 0));
    kb.declareMine(cell(1, 1));
    expect(() => kb.declareMine(cell(0, 0))).toThrow(ContradictionError);
    expect(() => kb.declareSafe(cell(1, 1))).toThrow(ContradictionError);
    expect(cellsToTuples(kb.safes)).toEqual([[0, 0]]);
    expect(cellsToTuples(kb.mines)).toEqual([[1, 1]]);
  });

  it("4) a mine that contradicts a sentence leaves sets and sentences untouched", () => {
    const kb = new KnowledgeBase(1, 3);
    kb.addSentence([cell(0, 1), cell(0, 2)], 1);
    kb.addSentence([cell(0, 0), cell(0, 2)], 1);
    kb.declareMine(cell(0, 1));
    const before = kb.snapshot();

    expect(() => kb.declareMine(cell(0, 2))).toThrow(ContradictionError);
    expect(kb.snapshot()).toEqual(before);
    expect(cellsToTuples(kb.mines)).toEqual([[0, 1]]);
    expect(kb.sentences.map(String)).toEqual(["{(0, 2)} = 0", "{(0, 0), (0, 2)} = 1"]);
  });

  it("5) a safe cell that contradicts a later sentence undoes the earlier discards", () => {
    const kb = new KnowledgeBase(1, 3);
    kb.addSentence([cell(0, 1), cell(0, 2)], 1);
    kb.addSentence([cell(0, 0), cell(0, 1)], 1);
    kb.declareSafe(cell(0, 0));
    expect(kb.sentences.map(String)).toEqual(["{(0, 1), (0, 2)} = 1", "{(0, 1)} = 1"]);

    expect(() => kb.declareSafe(cell(0, 1))).toThrow(ContradictionError);
    expect(cellsToTuples(kb.safes)).toEqual([[0, 0]]);
    expect(kb.sentences.map(String)).toEqual(["{(0, 1), (0, 2)} = 1", "{(0, 1)} = 1"]);
  });

  it("6) rejects non-positive dimensions", () => {
    expect(() => new KnowledgeBase(0, 3)).toThrow(ConfigError);
    expect(() => new KnowledgeBase(2, 1.5)).toThrow(ConfigError);
  });
});

describe("KnowledgeBase - observation", () => {
  it("1) a zero count marks every neighbour safe", () => {
    const kb = new KnowledgeBase(3, 3);
    kb.observe(cell(1, 1), 0);
    expect(kb.safes.size).toBe(9);
    expect(cellsToTuples(kb.movesMade)).toEqual([[1, 1]]);
    expect(kb.sentences).toHaveLength(0);
  });

  it("2) known mines are subtracted from the observed count", () => {
    const kb = new KnowledgeBase(2, 2);
    kb.declareMine(cell(1, 1));
    kb.observe(cell(0, 0), 2);
    expect(kb.sentences.map(String)).toEqual(["{(0, 1), (1, 0)} = 1"]);
  });

  it("3) a 1x3 board flags its single mine after two observations", () => {
    const kb = new KnowledgeBase(1, 3);
    kb.observe(cell(0, 0), 0);
    expect(cellsToTuples(kb.safes)).toEqual([[0, 0], [0, 1]]);
    expect(kb.mines.size).toBe(0);

    kb.observe(cell(0, 1), 1);
    expect(cellsToTuples(kb.mines)).toEqual([[0, 2]]);
    expect(kb.sentences).toHaveLength(0);
  });

  it("4) out-of-bounds, repeated and malformed observations are rejected without change", () => {
    const kb = new KnowledgeBase(2, 2);
    kb.observe(cell(0, 0), 1);
    const before = kb.snapshot();
    expect(() => kb.observe(cell(2, 0), 0)).toThrow(InvalidMoveError);
    expect(() => kb.observe(cell(0, 0), 1)).toThrow(InvalidMoveError);
    expect(() => kb.observe(cell(1, 1), 9)).toThrow(InvalidMoveError);
    expect(() => kb.observe(cell(1, 1), 1.5)).toThrow(InvalidMoveError);
    expect(kb.snapshot()).toEqual(before);
  });

  it("5) revealing a known mine is a contradiction", () => {
    const kb = new KnowledgeBase(2, 2);
    kb.declareMine(cell(1, 1));
    expect(() => kb.observe(cell(1, 1), 0)).toThrow(ContradictionError);
    expect(kb.movesMade.size).toBe(0);
  });

  it("6) an impossible count rolls the whole observation back", () => {
    const kb = new KnowledgeBase(1, 3);
    kb.observe(cell(0, 0), 0);
    const before = kb.snapshot();
    expect(() => kb.observe(cell(0, 1), 2)).toThrow(ContradictionError);
    expect(kb.snapshot()).toEqual(before);
    expect(cellsToTuples(kb.movesMade)).toEqual([[0, 0]]);
  });

  it("7) a contradiction found during closure rolls back too", () => {
    const kb = new KnowledgeBase(1, 3);
    kb.addSentence([cell(0, 0), cell(0, 1)], 1);
    expect(() => kb.addSentence([cell(0, 0), cell(0, 1)], 0)).toThrow(ContradictionError);
    expect(kb.sentences.map(String)).toEqual(["{(0, 0), (0, 1)} = 1"]);
    expect(kb.safes.size).toBe(0);
  });
});

describe("KnowledgeBase - subset inference", () => {
  it("1) {A, B} = 1 inside {A, B, C} = 2 proves C is a mine", () => {
    const kb = new KnowledgeBase(1, 3);
    kb.addSentence([cell(0, 0), cell(0, 1)], 1);
    const report = kb.addSentence([cell(0, 0), cell(0, 1), cell(0, 2)], 2);

    expect(report.sentences.map(String)).toEqual(["{(0, 2)} = 1"]);
    expect(cellsToTuples(report.mines)).toEqual([[0, 2]]);
    expect(report.passes).toBe(3);
    expect(cellsToTuples(kb.mines)).toEqual([[0, 2]]);
    expect(kb.sentences.map(String)).toEqual(["{(0, 0), (0, 1)} = 1"]);
  });

  it("2) {A, B, C} = 1 and {A, B} = 1 prove C is safe", () => {
    const kb = new KnowledgeBase(1, 3);
    kb.addSentence([cell(0, 0), cell(0, 1), cell(0, 2)], 1);
    const report = kb.addSentence([cell(0, 0), cell(0, 1)], 1);

    expect(report.sentences.map(String)).toEqual(["{(0, 2)} = 0"]);
    expect(cellsToTuples(report.safes)).toEqual([[0, 2]]);
    expect(cellsToTuples(kb.safes)).toEqual([[0, 2]]);
    expect(kb.mines.size).toBe(0);
  });

  it("3) known cells are folded out of a told sentence", () => {
    const kb = new KnowledgeBase(1, 2);
    kb.declareMine(cell(0, 0));
    kb.addSentence([cell(0, 0), cell(0, 1)], 1);
    expect(cellsToTuples(kb.safes)).toEqual([[0, 1]]);
    expect(kb.sentences).toHaveLength(0);
  });

  it("4) duplicate sentences collapse into one", () => {
    const kb = new KnowledgeBase(2, 2);
    kb.addSentence([cell(0, 0), cell(1, 1)], 1);
    kb.addSentence([cell(1, 1), cell(0, 0)], 1);
    expect(kb.sentences.map(String)).toEqual(["{(0, 0), (1, 1)} = 1"]);
  });

  it("5) closure at a fixpoint derives nothing", () => {
    const kb = new KnowledgeBase(1, 3);
    kb.observe(cell(0, 0), 0);
    kb.observe(cell(0, 1), 1);
    const before = kb.snapshot();
    const report = kb.closure();
    expect(report.passes).toBe(1);
    expect(report.safes).toHaveLength(0);
    expect(report.mines).toHaveLength(0);
    expect(report.sentences).toHaveLength(0);
    expect(kb.snapshot()).toEqual(before);
  });
});

describe("KnowledgeBase - properties over whole games", () => {
  const seeds = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

  it.each(seeds)("1) seed %i: facts only grow, stay disjoint and agree with the board", (seed) => {
    const session = GameSession.create({ height: 8, width: 8, mines: 10, seed });
    const kb = session.knowledge;
    let previous = kb.snapshot();

    while (!session.isOver()) {
      session.step();
      const current = kb.snapshot();

      expect(kb.safes.isSuperset(previous.safes.map(([r, c]) => cell(r, c)))).toBe(true);
      expect(kb.mines.isSuperset(previous.mines.map(([r, c]) => cell(r, c)))).toBe(true);
      expect(kb.safes.intersect(kb.mines).size).toBe(0);
      for (const sentence of kb.sentences) {
        expect(sentence.count).toBeGreaterThanOrEqual(0);
        expect(sentence.count).toBeLessThanOrEqual(sentence.size);
      }
      previous = current;
    }

    for (const mine of kb.mines) expect(session.board.isMine(mine)).toBe(true);
    for (const safe of kb.safes) expect(session.board.isMine(safe)).toBe(false);
  });

  it("1) an intermediate board closes without running away", () => {
    const board = Board.create({ height: 16, width: 16, mines: 40, seed: 11 });
    const session = new GameSession(board, new MinesweeperAgent(16, 16, mulberry32(12)), "large");
    session.play();
    expect(session.isOver()).toBe(true);
    for (const mine of session.knowledge.mines) expect(board.isMine(mine)).toBe(true);
  }, 30000);
});
