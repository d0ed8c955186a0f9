import { describe, it, expect } from "vitest";
import { cell, cellsToTuples } from "../Cell";
import { ContradictionError } from "../Errors";
import { Sentence } from "../Sentence";

const a = cell(0, 0);
const b = cell(0, 1);
const c = cell(0, 2);

describe("Sentence - known cells", () => {
  it("1) all cells are mines when the count equals the size", () => {
    const sentence = new Sentence([a, b], 2);
    expect(cellsToTuples(sentence.knownMines())).toEqual([[0, 0], [0, 1]]);
    expect(sentence.knownSafes().size).toBe(0);
  });

  it("2) all cells are safe when the count is zero", () => {
    const sentence = new Sentence([b, a], 0);
    expect(cellsToTuples(sentence.knownSafes())).toEqual([[0, 0], [0, 1]]);
    expect(sentence.knownMines().size).toBe(0);
  });

  it("3) an empty sentence yields neither mines nor safes", () => {
    const sentence = new Sentence([], 0);
    expect(sentence.knownMines().size).toBe(0);
    expect(sentence.knownSafes().size).toBe(0);
    expect(sentence.isEmpty()).toBe(true);
  });

  it("4) a partial count yields nothing", () => {
    const sentence = new Sentence([a, b, c], 1);
    expect(sentence.knownMines().size).toBe(0);
    expect(sentence.knownSafes().size).toBe(0);
  });
});

describe("Sentence - discarding known cells", () => {
  it("1) discardAsMine removes the cell and decrements the count", () => {
    const sentence = new Sentence([a, b, c], 2);
    sentence.discardAsMine(b);
    expect(sentence.toString()).toBe("{(0, 0), (0, 2)} = 1");
  });

  it("2) discardAsSafe removes the cell and keeps the count", () => {
    const sentence = new Sentence([a, b, c], 2);
    sentence.discardAsSafe(a);
    expect(sentence.toString()).toBe("{(0, 1), (0, 2)} = 2");
  });

  it("3) discarding a cell the sentence does not mention is a no-op", () => {
    const sentence = new Sentence([a, b], 1);
    sentence.discardAsMine(c);
    sentence.discardAsSafe(c);
    expect(sentence.toString()).toBe("{(0, 0), (0, 1)} = 1");
  });

  it("4) a mine inside a zero-count sentence is a contradiction", () => {
    const sentence = new Sentence([a, b], 0);
    expect(() => sentence.discardAsMine(a)).toThrow(ContradictionError);
    expect(sentence.toString()).toBe("{(0, 0), (0, 1)} = 0");
  });

  it("5) a safe cell inside an all-mines sentence is a contradiction", () => {
    const sentence = new Sentence([a, b], 2);
    expect(() => sentence.discardAsSafe(b)).toThrow(ContradictionError);
  });
});

describe("Sentence - construction and comparison", () => {
  it("1) rejects counts outside [0, |cells|]", () => {
    expect(() => new Sentence([a, b], 3)).toThrow(ContradictionError);
    expect(() => new Sentence([a, b], -1)).toThrow(ContradictionError);
    expect(() => new Sentence([a], 0.5)).toThrow(ContradictionError);
  });

  it("2) equality ignores cell order and duplicate coordinates", () => {
    expect(new Sentence([a, b], 1).equals(new Sentence([b, cell(0, 0)], 1))).toBe(true);
    expect(new Sentence([a, b], 1).equals(new Sentence([a, b], 0))).toBe(false);
    expect(new Sentence([a, b], 1).equals(new Sentence([a, c], 1))).toBe(false);
  });

  it("3) subtracting a subset leaves the exclusive cells and the remaining mines", () => {
    const superset = new Sentence([a, b, c], 2);
    const subset = new Sentence([a, b], 1);
    expect(subset.isSubsetOf(superset)).toBe(true);
    expect(superset.isSubsetOf(subset)).toBe(false);
    expect(superset.without(subset).toString()).toBe("{(0, 2)} = 1");
  });

  it("4) an empty sentence is never a subset", () => {
    expect(new Sentence([], 0).isSubsetOf(new Sentence([a], 0))).toBe(false);
  });

  it("5) sentences built from the same cells do not share them", () => {
    const first = new Sentence([a, b], 1);
    const second = new Sentence(first.cells, 1);
    first.discardAsSafe(a);
    expect(second.toString()).toBe("{(0, 0), (0, 1)} = 1");
    expect(first.clone().equals(first)).toBe(true);
  });

  it("6) toView lists cells in row-major order", () => {
    expect(new Sentence([c, a], 1).toView()).toEqual({ cells: [[0, 0], [0, 2]], count: 1 });
  });
});
