import _ from "lodash";
import {
    Cell,
    type CellSet,
    type CellTuple,
    cellSetOf,
    cellsToTuples,
    emptyCellSet,
    formatCell,
    formatCells,
    isInBounds,
    neighborsOf,
    sortCells,
} from "./Cell";
import { ConfigError, ContradictionError, InvalidMoveError } from "./Errors";
import { LogFunctions } from "./LogFunctions";
import { Sentence, type SentenceView } from "./Sentence";
import { Parameters } from "./Symbols";

/** What one run of the closure loop derived. */
export type ClosureReport = {
    passes: number;
    safes: Cell[];
    mines: Cell[];
    sentences: Sentence[];
};

export type KnowledgeSnapshot = {
    height: number;
    width: number;
    movesMade: CellTuple[];
    safes: CellTuple[];
    mines: CellTuple[];
    sentences: SentenceView[];
};

type Checkpoint = {
    movesMade: CellSet;
    safes: CellSet;
    mines: CellSet;
    sentences: Sentence[];
};

/**
 * KnowledgeBase holds everything the agent knows about one game.
 *
 * - `movesMade`: revealed cells.
 * - `safes` / `mines`: cells with a proven status. Disjoint, only ever grow.
 * - `sentences`: constraints "exactly `count` of `cells` are mines".
 *
 * Marking a cell safe or a mine is the only path that changes sentence contents;
 * everything derived routes through it.
 */
export class KnowledgeBase {
    private _movesMade: CellSet = emptyCellSet();
    private _safes: CellSet = emptyCellSet();
    private _mines: CellSet = emptyCellSet();
    private _sentences: Sentence[] = [];

    constructor(readonly height: number, readonly width: number) {
        if (!Number.isInteger(height) || !Number.isInteger(width) || height <= 0 || width <= 0) {
            throw new ConfigError(`Board dimensions must be positive integers, got ${height}x${width}`);
        }
    }

    get movesMade(): CellSet { return this._movesMade; }
    get safes(): CellSet { return this._safes; }
    get mines(): CellSet { return this._mines; }
    get sentences(): readonly Sentence[] { return this._sentences; }

    /** Cells with no proven status (revealed cells are always in `safes`). */
    public unknownCount(): number {
        return this.height * this.width - this._safes.size - this._mines.size;
    }

    /* ------------------------------ Mark propagation ------------------------------ */

    /**
     * Returns false when `target` was already a known mine.
     * A contradiction leaves the knowledge base as it was.
     */
    public declareMine(target: Cell): boolean {
        return this.transaction(`declare mine ${formatCell(target)}`, () => this.markMine(target));
    }

    /** Returns false when `target` was already known to be safe. */
    public declareSafe(target: Cell): boolean {
        return this.transaction(`declare safe ${formatCell(target)}`, () => this.markSafe(target));
    }

    private markMine(target: Cell): boolean {
        if (this._safes.has(target)) {
            throw new ContradictionError(`${formatCell(target)} is already known to be safe and cannot be a mine`);
        }
        if (this._mines.has(target)) return false;
        this._mines = this._mines.add(target);
        for (const sentence of this._sentences) sentence.discardAsMine(target);
        return true;
    }

    private markSafe(target: Cell): boolean {
        if (this._mines.has(target)) {
            throw new ContradictionError(`${formatCell(target)} is already known to be a mine and cannot be safe`);
        }
        if (this._safes.has(target)) return false;
        this._safes = this._safes.add(target);
        for (const sentence of this._sentences) sentence.discardAsSafe(target);
        return true;
    }

    /* ------------------------------ Observation ------------------------------ */

    /**
     * Fold "`target` is safe and has `count` adjacent mines" into the knowledge base,
     * then run the closure loop to a fixpoint.
     *
     * Any error leaves the knowledge base exactly as it was before the call.
     */
    public observe(target: Cell, count: number): ClosureReport {
        this.assertObservable(target, count);
        return this.transaction(`observe ${formatCell(target)} = ${count}`, () => {
            this._movesMade = this._movesMade.add(target);
            this.markSafe(target);
            this.appendConstraint(neighborsOf(target, this.height, this.width), count, `${formatCell(target)} = ${count}`);
            return this.closure();
        });
    }

    /**
     * Tell the knowledge base that exactly `count` of `cells` are mines, then close.
     * Known cells are folded in the same way as for an observation.
     */
    public addSentence(cells: Iterable<Cell>, count: number): ClosureReport {
        const given = cellSetOf(cells);
        for (const c of given) {
            if (!isInBounds(c, this.height, this.width)) {
                throw new InvalidMoveError(`${formatCell(c)} is outside the ${this.height}x${this.width} board`);
            }
        }
        if (!Number.isInteger(count) || count < 0) {
            throw new InvalidMoveError(`Mine count must be a non-negative integer, got ${count}`);
        }
        return this.transaction(`tell ${formatCells(given)} = ${count}`, () => {
            this.appendConstraint(sortCells(given), count, `${formatCells(given)} = ${count}`);
            return this.closure();
        });
    }

    private assertObservable(target: Cell, count: number): void {
        if (!isInBounds(target, this.height, this.width)) {
            throw new InvalidMoveError(`${formatCell(target)} is outside the ${this.height}x${this.width} board`);
        }
        if (this._movesMade.has(target)) {
            throw new InvalidMoveError(`${formatCell(target)} has already been revealed`);
        }
        if (!Number.isInteger(count) || count < 0 || count > Parameters.MAX_ADJACENT_MINES) {
            throw new InvalidMoveError(`Adjacent mine count must be an integer in [0, ${Parameters.MAX_ADJACENT_MINES}], got ${count}`);
        }
        if (this._mines.has(target)) {
            throw new ContradictionError(`${formatCell(target)} is a known mine and cannot be revealed as safe`);
        }
    }

    /** Drops known safes, subtracts known mines from the count, appends what is left. */
    private appendConstraint(cells: Cell[], count: number, label: string): void {
        const undecided = cells.filter(c => !this._safes.has(c));
        const [knownMines, unknown] = _.partition(undecided, c => this._mines.has(c));
        const adjusted = count - knownMines.length;

        if (adjusted < 0 || adjusted > unknown.length) {
            throw new ContradictionError(
                `${label}: ${knownMines.length} of those cells are known mines and ${unknown.length} remain undecided`
            );
        }
        if (unknown.length === 0) return;

        const sentence = new Sentence(unknown, adjusted);
        this._sentences.push(sentence);
        LogFunctions.file.info(`${label} → ${sentence}`);
    }

    /** Runs `body`; on any error restores the state from before and rethrows. */
    private transaction<T>(label: string, body: () => T): T {
        const checkpoint = this.checkpoint();
        try {
            return body();
        } catch (error) {
            this.restore(checkpoint);
            if (error instanceof Error) LogFunctions.file.error(`${label} rejected: ${error.message}`);
            throw error;
        }
    }

    /* ------------------------------ Closure ------------------------------ */

    /**
     * Repeat until a full pass derives nothing:
     *  1. collect the trivially known safes and mines of every sentence and declare them;
     *  2. for each ordered pair with `A ⊆ B` (A non-empty) stage `B − A`,
     *     unless it is empty, already known or already staged;
     *  3. append staged sentences, drop empty and duplicate ones.
     *
     * Sentences staged in a pass are only paired with each other on the next pass.
     * Terminates because safes/mines only grow and only finitely many distinct
     * sentences exist over the board's cells.
     */
    public closure(): ClosureReport {
        const report: ClosureReport = { passes: 0, safes: [], mines: [], sentences: [] };
        let updated = true;

        while (updated) {
            updated = false;
            report.passes++;

            let pendingSafes = emptyCellSet();
            let pendingMines = emptyCellSet();
            for (const sentence of this._sentences) {
                pendingSafes = pendingSafes.union(sentence.knownSafes());
                pendingMines = pendingMines.union(sentence.knownMines());
            }

            for (const safe of sortCells(pendingSafes)) {
                if (this.markSafe(safe)) {
                    report.safes.push(safe);
                    LogFunctions.file.derived(`safe ${formatCell(safe)}`);
                    updated = true;
                }
            }
            for (const mine of sortCells(pendingMines)) {
                if (this.markMine(mine)) {
                    report.mines.push(mine);
                    LogFunctions.file.derived(`mine ${formatCell(mine)}`);
                    updated = true;
                }
            }

            const staged: Sentence[] = [];
            for (const subset of this._sentences) {
                for (const superset of this._sentences) {
                    if (subset === superset || !subset.isSubsetOf(superset)) continue;
                    const inferred = superset.without(subset);
                    if (inferred.isEmpty()) continue;
                    if (this.hasSentence(inferred) || _.some(staged, s => s.equals(inferred))) continue;
                    staged.push(inferred);
                }
            }
            if (staged.length > 0) {
                this._sentences.push(...staged);
                report.sentences.push(...staged.map(s => s.clone()));
                _.forEach(staged, s => LogFunctions.file.derived(`sentence ${s}`));
                updated = true;
            }

            this._sentences = _.uniqWith(_.reject(this._sentences, s => s.isEmpty()), (a, b) => a.equals(b));
        }

        return report;
    }

    public hasSentence(candidate: Sentence): boolean {
        return _.some(this._sentences, s => s.equals(candidate));
    }

    /* ------------------------------ State ------------------------------ */

    private checkpoint(): Checkpoint {
        return {
            movesMade: this._movesMade,
            safes: this._safes,
            mines: this._mines,
            sentences: this._sentences.map(s => s.clone()),
        };
    }

    private restore(checkpoint: Checkpoint): void {
        this._movesMade = checkpoint.movesMade;
        this._safes = checkpoint.safes;
        this._mines = checkpoint.mines;
        this._sentences = checkpoint.sentences;
    }

    public snapshot(): KnowledgeSnapshot {
        return {
            height: this.height,
            width: this.width,
            movesMade: cellsToTuples(this._movesMade),
            safes: cellsToTuples(this._safes),
            mines: cellsToTuples(this._mines),
            sentences: this._sentences.map(s => s.toView()),
        };
    }
}
