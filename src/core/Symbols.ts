export class Symbols {
    /* board glyphs */
    public static readonly HIDDEN = '#';
    public static readonly FLAG = 'F';
    public static readonly MINE = 'X';
    public static readonly EMPTY = '.';

    /* sentence display */
    public static readonly SET_OPENER = '{';
    public static readonly SET_CLOSER = '}';
    public static readonly CELL_SEPARATOR = ', ';
    public static readonly COUNT_SEPARATOR = ' = ';
}

/**
 * How the agent arrived at a move.
 */
export enum MoveKind {
    SAFE = "safe",      // proven safe by the knowledge base
    RANDOM = "random",  // blind guess among cells not known to be mines
    MANUAL = "manual",  // requested by the user through a driver
    STUCK = "stuck"     // no legal cell remains
}

/**
 * Lifecycle of a game session.
 */
export enum GameStatus {
    PLAYING = "playing",
    WON = "won",        // every mine flagged
    LOST = "lost",      // a mine was revealed
    STUCK = "stuck"     // no move left to try
}

export class Parameters {
    /* a cell has at most 8 neighbours */
    public static readonly MAX_ADJACENT_MINES = 8;
    public static readonly SESSION_ID_LENGTH = 8;
    public static readonly DEFAULT_PORT = 3000;
    public static readonly DEFAULT_PRESET = "beginner";
    public static readonly LOG_FILENAME = "minesweeper.log";
}
