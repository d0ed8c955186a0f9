import _ from "lodash";
import { z } from "zod";
import { cell, formatCell } from "./Cell";
import { type BoardPreset, resolvePreset } from "./Config";
import { MinesweeperError } from "./Errors";
import type { GameSession, MoveRecord } from "./GameSession";
import { PrintFunctions } from "./LogFunctions";
import type { SessionStoreApi } from "./SessionStore";
import { MoveKind } from "./Symbols";

export type CommandResult = {
  output: string;
  exit?: boolean;
};

const SeedSchema = z.coerce.number().int();
const CoordinateSchema = z.coerce.number().int().nonnegative();

export const HELP_TEXT = [
  "new [preset] [seed]   start a game (presets: see presets.yml)",
  "step                  let the agent make one move",
  "play                  let the agent play until the game ends",
  "reveal <row> <col>    reveal a cell yourself",
  "board | knowledge | stats",
  "exit",
].join("\n");

export function formatMove(move: MoveRecord): string {
  if (move.kind === MoveKind.STUCK || !move.cell) return `Turn ${move.turn}: no move left (${move.status})`;
  const target = formatCell(cell(...move.cell));
  if (move.count === null) return `Turn ${move.turn}: ${move.kind} move ${target} hit a mine (${move.status})`;
  return `Turn ${move.turn}: ${move.kind} move ${target} → ${move.count} (${move.status})`;
}

/**
 * Text commands of the interactive console. Keeps track of the "current" game;
 * the games themselves live in the session store.
 */
export class CommandHandler {
  private currentId: string | null = null;

  constructor(
    private readonly store: SessionStoreApi,
    private readonly defaults: { preset: string; seed?: number },
    private readonly presets?: Record<string, BoardPreset>
  ) {}

  get current(): GameSession | undefined {
    return this.currentId ? this.store.getState().get(this.currentId) : undefined;
  }

  handle(input: string): CommandResult {
    const [command = "", ...args] = _.compact(input.trim().split(/\s+/));
    try {
      return this.dispatch(command.toLowerCase(), args);
    } catch (error) {
      if (error instanceof MinesweeperError) return { output: `${error.name}: ${error.message}` };
      throw error;
    }
  }

  private dispatch(command: string, args: string[]): CommandResult {
    switch (command) {
      case "":
        return { output: "Please enter a command (try 'help')" };
      case "help":
        return { output: HELP_TEXT };
      case "exit":
        return { output: "Bye.", exit: true };
      case "new":
        return this.newGame(args);
      default:
        break;
    }

    const session = this.current;
    if (!session) return { output: "No game running; start one with 'new'" };

    switch (command) {
      case "step":
        return { output: formatMove(session.step()) };
      case "play": {
        const before = session.history.length;
        const moves = session.play().slice(before);
        return { output: [...moves.map(formatMove), `Game ${session.id} ${session.status} after ${session.history.length} turns`].join("\n") };
      }
      case "reveal": {
        const parsed = z.tuple([CoordinateSchema, CoordinateSchema]).safeParse(args);
        if (!parsed.success) return { output: "Usage: reveal <row> <col>" };
        return { output: formatMove(session.reveal(cell(...parsed.data))) };
      }
      case "board":
        return { output: PrintFunctions.renderBoard(session) };
      case "knowledge":
        return { output: PrintFunctions.renderKnowledge(session.knowledge) };
      case "stats":
        return { output: PrintFunctions.renderStats(session) };
      default:
        return { output: `Unknown command '${command}' (try 'help')` };
    }
  }

  private newGame(args: string[]): CommandResult {
    const [presetName = this.defaults.preset, seedText] = args;
    const preset = resolvePreset(presetName, this.presets);
    let seed = this.defaults.seed;
    if (seedText !== undefined) {
      const parsed = SeedSchema.safeParse(seedText);
      if (!parsed.success) return { output: `Seed must be an integer, got '${seedText}'` };
      seed = parsed.data;
    }
    const session = this.store.getState().create({ ...preset, seed });
    this.currentId = session.id;
    return { output: `Game ${session.id}: ${preset.height}x${preset.width} with ${preset.mines} mines` };
  }
}
