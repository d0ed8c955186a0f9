/**
 * Error taxonomy of the agent.
 *
 * - ContradictionError: the knowledge base was asked to hold two incompatible facts
 *   (a cell both safe and a mine, a sentence count outside `[0, |cells|]`). Fatal.
 * - InvalidMoveError: the caller asked for something illegal (out of bounds,
 *   already revealed, finished game). Nothing is mutated.
 * - ConfigError: bad board dimensions, preset or environment value.
 */
export class MinesweeperError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ContradictionError extends MinesweeperError {}

export class InvalidMoveError extends MinesweeperError {}

export class ConfigError extends MinesweeperError {}
