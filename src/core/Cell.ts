import { Record, Set as ImmutableSet } from "immutable";
import _ from "lodash";
import { Symbols } from "./Symbols";

const CellRecord = Record({ row: 0, col: 0 }, "Cell");

/**
 * A board coordinate, 0-indexed.
 *
 * Cells are immutable Records, so equality and hashing are structural:
 * `cell(1, 2)` and another `cell(1, 2)` are the same member of a `CellSet`.
 */
export class Cell extends CellRecord {
    toString(): string { return `(${this.row}, ${this.col})`; }
}

export type CellTuple = [row: number, col: number];
export type CellSet = ImmutableSet<Cell>;

export const cell = (row: number, col: number): Cell => new Cell({ row, col });
export const emptyCellSet = (): CellSet => ImmutableSet<Cell>();
export const cellSetOf = (cells: Iterable<Cell>): CellSet => ImmutableSet<Cell>(cells);

export function isInBounds(target: Cell, height: number, width: number): boolean {
    return target.row >= 0 && target.row < height && target.col >= 0 && target.col < width;
}

/**
 * The up-to-8 cells around `target`, clipped to the board, in row-major order.
 *
 * Example (3x3 board):
 *   neighborsOf((0, 0)) → (0, 1), (1, 0), (1, 1)
 */
export function neighborsOf(target: Cell, height: number, width: number): Cell[] {
    const neighbors: Cell[] = [];
    for (let row = target.row - 1; row <= target.row + 1; row++) {
        for (let col = target.col - 1; col <= target.col + 1; col++) {
            if (row === target.row && col === target.col) continue;
            const candidate = cell(row, col);
            if (isInBounds(candidate, height, width)) neighbors.push(candidate);
        }
    }
    return neighbors;
}

export function allCells(height: number, width: number): Cell[] {
    return _.flatMap(_.range(height), row => _.map(_.range(width), col => cell(row, col)));
}

export function compareCells(a: Cell, b: Cell): number {
    return a.row - b.row || a.col - b.col;
}

/** Row-major order, used wherever output must be reproducible. */
export function sortCells(cells: Iterable<Cell>): Cell[] {
    return Array.from(cells).sort(compareCells);
}

export const toTuple = (target: Cell): CellTuple => [target.row, target.col];
export const cellsToTuples = (cells: Iterable<Cell>): CellTuple[] => sortCells(cells).map(toTuple);

export const formatCell = (target: Cell): string => target.toString();

export function formatCells(cells: Iterable<Cell>): string {
    return Symbols.SET_OPENER + sortCells(cells).map(formatCell).join(Symbols.CELL_SEPARATOR) + Symbols.SET_CLOSER;
}
