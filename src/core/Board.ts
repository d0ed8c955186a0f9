import { allCells, Cell, type CellSet, cellSetOf, emptyCellSet, formatCell, isInBounds, neighborsOf } from "./Cell";
import { ConfigError, InvalidMoveError } from "./Errors";
import { createRandomSource, sampleWithoutReplacement } from "./Random";

export interface BoardOptions {
    height: number;
    width: number;
    mines: number;
    seed?: number;
}

/**
 * Board is the ground truth of one game: where the mines are, how many
 * touch each cell, and which cells have been flagged.
 *
 * The agent never looks inside; a driver asks the board and hands the
 * answer (`cell`, `adjacentMineCount`) to the agent.
 */
export class Board {
    private _flagged: CellSet = emptyCellSet();

    private constructor(readonly height: number, readonly width: number, private readonly _mines: CellSet) {}

    /** Random layout; the same seed gives the same layout. */
    static create(options: BoardOptions): Board {
        const { height, width, mines, seed } = options;
        Board.assertDimensions(height, width);
        if (!Number.isInteger(mines) || mines < 0 || mines > height * width) {
            throw new ConfigError(`A ${height}x${width} board cannot hold ${mines} mines`);
        }
        const placed = sampleWithoutReplacement(allCells(height, width), mines, createRandomSource(seed));
        return new Board(height, width, cellSetOf(placed));
    }

    /** Fixed layout. */
    static withMines(height: number, width: number, mines: Iterable<Cell>): Board {
        Board.assertDimensions(height, width);
        const layout = cellSetOf(mines);
        for (const mine of layout) {
            if (!isInBounds(mine, height, width)) {
                throw new ConfigError(`Mine ${formatCell(mine)} is outside the ${height}x${width} board`);
            }
        }
        return new Board(height, width, layout);
    }

    private static assertDimensions(height: number, width: number): void {
        if (!Number.isInteger(height) || !Number.isInteger(width) || height <= 0 || width <= 0) {
            throw new ConfigError(`Board dimensions must be positive integers, got ${height}x${width}`);
        }
    }

    get mineCells(): CellSet { return this._mines; }
    get mineCount(): number { return this._mines.size; }
    get flagged(): CellSet { return this._flagged; }

    private assertInBounds(target: Cell): void {
        if (!isInBounds(target, this.height, this.width)) {
            throw new InvalidMoveError(`${formatCell(target)} is outside the ${this.height}x${this.width} board`);
        }
    }

    public isMine(target: Cell): boolean {
        this.assertInBounds(target);
        return this._mines.has(target);
    }

    /** Mines among the up-to-8 neighbours, not counting the cell itself. */
    public adjacentMineCount(target: Cell): number {
        this.assertInBounds(target);
        return neighborsOf(target, this.height, this.width).filter(n => this._mines.has(n)).length;
    }

    public flag(target: Cell): void {
        this.assertInBounds(target);
        this._flagged = this._flagged.add(target);
    }

    /** True when `flags` is exactly the set of mines. */
    public allMinesFlagged(flags: Iterable<Cell>): boolean {
        return cellSetOf(flags).equals(this._mines);
    }

    public won(): boolean {
        return this.allMinesFlagged(this._flagged);
    }
}
