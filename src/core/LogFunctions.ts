// LogFunctions.ts
import fs from "fs";
import path from "path";
import colors from "ansi-colors";
import stringify from "json-stringify-pretty-compact";
import numeral from "numeral";
import { table } from "table";
import _ from "lodash";
// ───── Imports ─────
import { allCells, cell, Cell, formatCells } from "./Cell";
import { loadConfig } from "./Config";
import type { GameSession } from "./GameSession";
import type { KnowledgeBase } from "./KnowledgeBase";
import { GameStatus, Parameters, Symbols } from "./Symbols";

export interface LogOptions {
  directory: string;
  filename: string;
  toFile: boolean;
  toConsole: boolean;
}

export class LogFunctions {
  private static options: LogOptions = {
    directory: path.resolve("logs"),
    filename: Parameters.LOG_FILENAME,
    toFile: true,
    toConsole: true,
  };
  private static logFile = path.join(this.options.directory, this.options.filename);
  private static initialized = false;

  /** Options not given here come from the environment (LOG_DIR, LOG_TO_FILE, LOG_TO_CONSOLE). */
  static init(overrides: Partial<LogOptions> = {}): void {
    if (this.initialized) return;
    const { logging } = loadConfig();
    this.options = { ...logging, filename: Parameters.LOG_FILENAME, ...overrides };
    this.logFile = path.join(this.options.directory, this.options.filename);
    if (this.options.toFile) {
      fs.mkdirSync(this.options.directory, { recursive: true });
      fs.writeFileSync(this.logFile, "", "utf8");
    }
    this.initialized = true;
    this.file.info("LogFunctions initialized");
  }

  private static ensureInit(): void { if (!this.initialized) this.init(); }

  private static writeToFile(level: string, msg: string): void {
    this.ensureInit();
    if (!this.options.toFile) return;
    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] [${level}]: ${msg}\n`;
    fs.appendFileSync(this.logFile, line);
  }

  private static writeToConsole(level: string, msg: string): void {
    this.ensureInit();
    if (!this.options.toConsole) return;
    const colorMap: Record<string, (text: string) => string> = {
      INFO: colors.green,
      WARN: colors.yellow,
      ERROR: colors.red
    };
    const colorFn = colorMap[level] ?? ((x: string) => x);
    console.log(`[${level}]: ${colorFn(msg)}`);
  }

  // ═══ FILE ONLY LOGGING ═══
  static file = {
    info: (msg: string) => LogFunctions.writeToFile("INFO", msg),
    warn: (msg: string) => LogFunctions.writeToFile("WARN", msg),
    error: (msg: string) => LogFunctions.writeToFile("ERROR", msg),
    derived: (msg: string) => LogFunctions.writeToFile("DERIVED", msg),
    json: (label: string, obj: unknown) => LogFunctions.writeToFile("INFO", `${label}:\n${stringify(obj)}`)
  };

  // ═══ BOTH CONSOLE AND FILE LOGGING ═══
  static both = {
    info: (msg: string) => { LogFunctions.writeToConsole("INFO", msg); LogFunctions.writeToFile("INFO", msg); },
    warn: (msg: string) => { LogFunctions.writeToConsole("WARN", msg); LogFunctions.writeToFile("WARN", msg); },
    error: (msg: string) => { LogFunctions.writeToConsole("ERROR", msg); LogFunctions.writeToFile("ERROR", msg); }
  };

  static info = (msg: string) => LogFunctions.both.info(msg);
  static error = (msg: string) => LogFunctions.both.error(msg);

  // ═══ UTILITY FUNCTIONS ═══
  static getLogFilePath = (): string => { LogFunctions.ensureInit(); return LogFunctions.logFile; };
  static readFile = (): string => { LogFunctions.ensureInit(); return fs.existsSync(LogFunctions.logFile) ? fs.readFileSync(LogFunctions.logFile, "utf8") : ""; };
  static reset = (overrides: Partial<LogOptions> = {}): void => { LogFunctions.initialized = false; LogFunctions.init(overrides); };
}


export class PrintFunctions {
  /** Plain glyph for one cell, before colouring. */
  static cellGlyph(session: GameSession, target: Cell): string {
    const count = session.countAt(target);
    if (count !== undefined) return count === 0 ? Symbols.EMPTY : `${count}`;
    if (session.board.flagged.has(target)) return Symbols.FLAG;
    if (session.status === GameStatus.LOST && session.board.isMine(target)) return Symbols.MINE;
    return Symbols.HIDDEN;
  }

  private static colorGlyph(glyph: string): string {
    switch (glyph) {
      case Symbols.FLAG: return colors.red.bold(glyph);
      case Symbols.MINE: return colors.bgRed(glyph);
      case Symbols.HIDDEN: return colors.gray(glyph);
      case Symbols.EMPTY: return colors.dim(glyph);
      default: return colors.cyan(glyph);
    }
  }

  static renderBoard(session: GameSession): string {
    const { height, width } = session.board;
    const header = ["", ..._.map(_.range(width), col => colors.bold(`${col}`))];
    const rows: string[][] = _.map(_.range(height), row => [
      colors.bold(`${row}`),
      ..._.map(_.range(width), col => this.colorGlyph(this.cellGlyph(session, cell(row, col)))),
    ]);
    return table([header, ...rows], {
      header: { alignment: 'center', content: `Game ${session.id} (${session.status})` },
      columnDefault: { alignment: 'center' }
    });
  }

  static renderKnowledge(knowledge: KnowledgeBase): string {
    const data: string[][] = _.map(knowledge.sentences, (sentence, index) => [
      `${index + 1}`,
      colors.blue(formatCells(sentence.cells)),
      colors.yellow(`${sentence.count}`),
    ]);
    if (_.isEmpty(data)) return colors.yellow('Knowledge base holds no sentences.');
    return table([[colors.bold('#'), colors.bold('Cells'), colors.bold('Mines')], ...data], {
      header: { alignment: 'center', content: 'Sentences' }
    });
  }

  static renderStats(session: GameSession): string {
    const stats = session.stats();
    const data: string[][] = [
      [colors.bold('Statistic'), colors.bold('Value')],
      ['Status', colors.green(session.status)],
      ['Board', `${session.board.height} x ${session.board.width}`],
      ['Turns', `${stats.turns}`],
      ['Revealed', colors.cyan(`${stats.revealed}`)],
      ['Flagged', colors.red(`${stats.flagged} / ${stats.mines}`)],
      ['Unknown cells', colors.yellow(`${stats.unknown}`)],
      ['Cells resolved', colors.magenta(numeral(stats.resolved).format('0.0%'))],
    ];
    return table(data, {
      header: { alignment: 'center', content: 'Game Statistics' },
      columnDefault: { alignment: 'left' }
    });
  }

  /** Every cell of the board as glyph rows, e.g. ["1F#", "11#"]. */
  static glyphRows(session: GameSession): string[] {
    const { height, width } = session.board;
    return _.map(_.chunk(allCells(height, width), width), row => row.map(c => this.cellGlyph(session, c)).join(""));
  }
}
