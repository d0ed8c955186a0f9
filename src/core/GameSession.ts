import { Map as ImmutableMap } from "immutable";
import { nanoid } from "nanoid";
import { Board, type BoardOptions } from "./Board";
import { Cell, type CellTuple, cellsToTuples, formatCell, toTuple } from "./Cell";
import { InvalidMoveError } from "./Errors";
import { KnowledgeBase, type KnowledgeSnapshot } from "./KnowledgeBase";
import { LogFunctions } from "./LogFunctions";
import { MinesweeperAgent } from "./Agent";
import { createRandomSource } from "./Random";
import { GameStatus, MoveKind, Parameters } from "./Symbols";

export type MoveRecord = {
    turn: number;
    cell: CellTuple | null;
    kind: MoveKind;
    count: number | null;   // adjacent mines, null when nothing was revealed safely
    status: GameStatus;     // status after the move
};

export type GameStats = {
    turns: number;
    revealed: number;
    flagged: number;
    mines: number;
    unknown: number;
    resolved: number;       // fraction of cells with a known status
};

export type GameSnapshot = {
    id: string;
    status: GameStatus;
    height: number;
    width: number;
    mines: number;
    revealed: { row: number; col: number; count: number }[];
    flagged: CellTuple[];
    history: MoveRecord[];
    knowledge: KnowledgeSnapshot;
};

/**
 * GameSession drives one game: the agent picks, the board answers, the agent
 * learns. Board and agent strictly alternate; nothing here reasons about mines.
 *
 * Example:
 * - `GameSession.create({ height: 8, width: 8, mines: 8, seed: 7 }).play()`
 *   runs a whole game and returns its move history.
 */
export class GameSession {
    private _status: GameStatus = GameStatus.PLAYING;
    private _history: MoveRecord[] = [];
    private _counts: ImmutableMap<Cell, number> = ImmutableMap<Cell, number>();

    constructor(
        readonly board: Board,
        readonly agent: MinesweeperAgent,
        readonly id: string = nanoid(Parameters.SESSION_ID_LENGTH)
    ) {}

    /** Board and agent share one seed: the layout from `seed`, the guesses from `seed + 1`. */
    static create(options: BoardOptions & { id?: string }): GameSession {
        const board = Board.create(options);
        const random = createRandomSource(options.seed === undefined ? undefined : options.seed + 1);
        return new GameSession(board, new MinesweeperAgent(board.height, board.width, random), options.id);
    }

    get status(): GameStatus { return this._status; }
    get history(): readonly MoveRecord[] { return this._history; }
    get knowledge(): KnowledgeBase { return this.agent.knowledge; }

    isOver(): boolean { return this._status !== GameStatus.PLAYING; }

    /** Adjacent-mine count of a revealed cell. */
    countAt(target: Cell): number | undefined { return this._counts.get(target); }

    /** One agent turn. */
    public step(): MoveRecord {
        this.assertPlaying();
        const decision = this.agent.decide();
        if (decision.kind === MoveKind.STUCK) {
            this._status = GameStatus.STUCK;
            LogFunctions.both.warn(`Game ${this.id}: no moves left`);
            return this.record(null, MoveKind.STUCK, null);
        }
        return this.revealCell(decision.cell, decision.kind);
    }

    /** A reveal chosen by the user instead of the agent. */
    public reveal(target: Cell): MoveRecord {
        this.assertPlaying();
        if (this.knowledge.movesMade.has(target)) {
            throw new InvalidMoveError(`${formatCell(target)} has already been revealed`);
        }
        return this.revealCell(target, MoveKind.MANUAL);
    }

    /** Steps until the game is won, lost or stuck. */
    public play(): readonly MoveRecord[] {
        while (!this.isOver()) this.step();
        return this._history;
    }

    private revealCell(target: Cell, kind: MoveKind): MoveRecord {
        if (this.board.isMine(target)) {
            this._status = GameStatus.LOST;
            LogFunctions.both.error(`Game ${this.id}: ${kind} move ${formatCell(target)} hit a mine`);
            return this.record(target, kind, null);
        }

        const count = this.board.adjacentMineCount(target);
        this.agent.observe(target, count);
        this._counts = this._counts.set(target, count);
        for (const mine of this.knowledge.mines) this.board.flag(mine);

        if (this.board.won()) this._status = GameStatus.WON;
        LogFunctions.file.info(`Game ${this.id}: ${kind} move ${formatCell(target)} → ${count}`);
        return this.record(target, kind, count);
    }

    private record(target: Cell | null, kind: MoveKind, count: number | null): MoveRecord {
        const move: MoveRecord = {
            turn: this._history.length + 1,
            cell: target ? toTuple(target) : null,
            kind,
            count,
            status: this._status,
        };
        this._history.push(move);
        if (this.isOver()) LogFunctions.file.json(`Game ${this.id} final state`, this.snapshot());
        return move;
    }

    private assertPlaying(): void {
        if (this.isOver()) {
            throw new InvalidMoveError(`Game ${this.id} is over (${this._status})`);
        }
    }

    public stats(): GameStats {
        const cells = this.board.height * this.board.width;
        const unknown = this.knowledge.unknownCount();
        return {
            turns: this._history.length,
            revealed: this._counts.size,
            flagged: this.board.flagged.size,
            mines: this.board.mineCount,
            unknown,
            resolved: (cells - unknown) / cells,
        };
    }

    public snapshot(): GameSnapshot {
        return {
            id: this.id,
            status: this._status,
            height: this.board.height,
            width: this.board.width,
            mines: this.board.mineCount,
            revealed: Array.from(this._counts.entries())
                .map(([c, count]) => ({ row: c.row, col: c.col, count }))
                .sort((a, b) => a.row - b.row || a.col - b.col),
            flagged: cellsToTuples(this.board.flagged),
            history: [...this._history],
            knowledge: this.knowledge.snapshot(),
        };
    }
}
