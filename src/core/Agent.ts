import { allCells, Cell, sortCells } from "./Cell";
import { ConfigError } from "./Errors";
import { type ClosureReport, KnowledgeBase } from "./KnowledgeBase";
import { createRandomSource, pickRandom, type RandomSource } from "./Random";
import { MoveKind } from "./Symbols";

export type MoveDecision =
    | { kind: MoveKind.SAFE; cell: Cell }
    | { kind: MoveKind.RANDOM; cell: Cell }
    | { kind: MoveKind.STUCK };

/**
 * Move policy on top of a KnowledgeBase.
 *
 * Per turn: a proven-safe unexplored cell if one exists, otherwise a uniformly
 * random cell that is neither revealed nor a known mine, otherwise stuck.
 */
export class MinesweeperAgent {
    private readonly _knowledge: KnowledgeBase;
    private readonly _random: RandomSource;

    constructor(height: number, width: number, random: RandomSource = createRandomSource()) {
        this._knowledge = new KnowledgeBase(height, width);
        this._random = random;
    }

    get knowledge(): KnowledgeBase { return this._knowledge; }
    get height(): number { return this._knowledge.height; }
    get width(): number { return this._knowledge.width; }

    public observe(target: Cell, count: number): ClosureReport {
        return this._knowledge.observe(target, count);
    }

    /** Smallest `(row, col)` among known safes not yet revealed. */
    public chooseSafeMove(): Cell | null {
        const candidates = this._knowledge.safes.subtract(this._knowledge.movesMade);
        return sortCells(candidates)[0] ?? null;
    }

    public chooseRandomMove(height: number = this.height, width: number = this.width): Cell | null {
        if (!Number.isInteger(height) || !Number.isInteger(width) || height < 0 || width < 0) {
            throw new ConfigError(`Board dimensions must be non-negative integers, got ${height}x${width}`);
        }
        const { movesMade, mines } = this._knowledge;
        const choices = allCells(height, width).filter(c => !movesMade.has(c) && !mines.has(c));
        return pickRandom(choices, this._random);
    }

    public decide(): MoveDecision {
        const safe = this.chooseSafeMove();
        if (safe) return { kind: MoveKind.SAFE, cell: safe };
        const guess = this.chooseRandomMove();
        if (guess) return { kind: MoveKind.RANDOM, cell: guess };
        return { kind: MoveKind.STUCK };
    }
}
