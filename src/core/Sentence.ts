import { Cell, type CellSet, type CellTuple, cellSetOf, cellsToTuples, emptyCellSet, formatCell, formatCells } from "./Cell";
import { ContradictionError } from "./Errors";
import { Symbols } from "./Symbols";

export interface SentenceView {
    cells: CellTuple[];
    count: number;
}

/**
 * Sentence states that exactly `count` of `cells` are mines.
 *
 * Invariant: `0 <= count <= |cells|`. Construction and both discard operations
 * raise a ContradictionError rather than break it.
 *
 * Example:
 * - `{(0, 1), (1, 0), (1, 1)} = 1` → one of the three is a mine.
 * - after `discardAsSafe((1, 1))` → `{(0, 1), (1, 0)} = 1`.
 * - after `discardAsMine((0, 1))` → `{(1, 0)} = 0`, so (1, 0) is safe.
 */
export class Sentence {
    private _cells: CellSet;
    private _count: number;

    constructor(cells: Iterable<Cell>, count: number) {
        this._cells = cellSetOf(cells);
        if (!Number.isInteger(count) || count < 0 || count > this._cells.size) {
            throw new ContradictionError(`Sentence ${formatCells(this._cells)}${Symbols.COUNT_SEPARATOR}${count} has an impossible mine count`);
        }
        this._count = count;
    }

    get cells(): CellSet { return this._cells; }
    get count(): number { return this._count; }
    get size(): number { return this._cells.size; }

    isEmpty(): boolean { return this._cells.size === 0; }
    has(target: Cell): boolean { return this._cells.has(target); }

    /** Every cell, when the count says all of them are mines. */
    public knownMines(): CellSet {
        return this._count === this._cells.size && this._count !== 0 ? this._cells : emptyCellSet();
    }

    /** Every cell, when the count is zero. */
    public knownSafes(): CellSet {
        return this._count === 0 ? this._cells : emptyCellSet();
    }

    public discardAsMine(target: Cell): void {
        if (!this._cells.has(target)) return;
        if (this._count === 0) {
            throw new ContradictionError(`${formatCell(target)} cannot be a mine: ${this} says none of its cells are`);
        }
        this._cells = this._cells.delete(target);
        this._count -= 1;
    }

    public discardAsSafe(target: Cell): void {
        if (!this._cells.has(target)) return;
        if (this._count === this._cells.size) {
            throw new ContradictionError(`${formatCell(target)} cannot be safe: ${this} says all of its cells are mines`);
        }
        this._cells = this._cells.delete(target);
    }

    /** Non-empty subset test used by the subset-inference rule. */
    public isSubsetOf(that: Sentence): boolean {
        return !this.isEmpty() && this._cells.isSubset(that._cells);
    }

    /**
     * `this − subset`: the cells only `this` mentions hold the mines `subset` does not account for.
     *
     *   {(0, 0), (0, 1), (0, 2)} = 2  minus  {(0, 0), (0, 1)} = 1  →  {(0, 2)} = 1
     */
    public without(subset: Sentence): Sentence {
        return new Sentence(this._cells.subtract(subset._cells), this._count - subset._count);
    }

    public equals(that: Sentence): boolean {
        return this._count === that._count && this._cells.equals(that._cells);
    }

    public clone(): Sentence {
        return new Sentence(this._cells, this._count);
    }

    public toView(): SentenceView {
        return { cells: cellsToTuples(this._cells), count: this._count };
    }

    toString(): string { return `${formatCells(this._cells)}${Symbols.COUNT_SEPARATOR}${this._count}`; }
}
