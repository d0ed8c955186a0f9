// HttpApplication.ts: games as JSON resources over express

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { z } from "zod";
import { cell } from "./Cell";
import { type BoardPreset, BoardPresetSchema, resolvePreset } from "./Config";
import { ConfigError, ContradictionError, InvalidMoveError, MinesweeperError } from "./Errors";
import type { GameSession } from "./GameSession";
import { LogFunctions } from "./LogFunctions";
import type { SessionStoreApi } from "./SessionStore";

export interface HttpApplicationOptions {
  store: SessionStoreApi;
  seed?: number;
  presets?: Record<string, BoardPreset>;
}

// -------------------------
// Request schemas
// -------------------------
const CreateGameSchema = z.union([
  z.object({ preset: z.string().min(1), seed: z.number().int().optional() }),
  z.intersection(BoardPresetSchema, z.object({ seed: z.number().int().optional() })),
]);

const RevealSchema = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative(),
});

class NotFoundError extends MinesweeperError {}

function statusFor(error: MinesweeperError): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ContradictionError) return 409;
  if (error instanceof InvalidMoveError || error instanceof ConfigError) return 400;
  return 500;
}

export function createApplication({ store, seed, presets }: HttpApplicationOptions): Express {
  const findSession = (request: Request): GameSession => {
    const session = store.getState().get(request.params.id);
    if (!session) throw new NotFoundError(`No game with id '${request.params.id}'`);
    return session;
  };

  const application = express();
  application.use(cors());
  application.use(express.json());

  application.post("/games", (request: Request, response: Response) => {
    const parsed = CreateGameSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return response.status(400).json({ ok: false, error: parsed.error.issues.map(i => i.message).join("; ") });
    }
    const body = parsed.data;
    const board = "preset" in body ? resolvePreset(body.preset, presets) : body;
    const session = store.getState().create({ height: board.height, width: board.width, mines: board.mines, seed: body.seed ?? seed });
    return response.status(201).json(session.snapshot());
  });

  application.get("/games/:id", (request: Request, response: Response) => {
    return response.json(findSession(request).snapshot());
  });

  application.post("/games/:id/step", (request: Request, response: Response) => {
    const session = findSession(request);
    const move = session.step();
    return response.json({ move, game: session.snapshot() });
  });

  application.post("/games/:id/play", (request: Request, response: Response) => {
    const session = findSession(request);
    session.play();
    return response.json(session.snapshot());
  });

  application.post("/games/:id/reveal", (request: Request, response: Response) => {
    const session = findSession(request);
    const parsed = RevealSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return response.status(400).json({ ok: false, error: "Body must be { row, col } with non-negative integers" });
    }
    const move = session.reveal(cell(parsed.data.row, parsed.data.col));
    return response.json({ move, game: session.snapshot() });
  });

  application.delete("/games/:id", (request: Request, response: Response) => {
    const removed = store.getState().remove(request.params.id);
    return removed ? response.status(204).end() : response.status(404).json({ ok: false, error: "Unknown game" });
  });

  application.use((error: unknown, request: Request, response: Response, next: NextFunction) => {
    if (!(error instanceof MinesweeperError)) return next(error);
    LogFunctions.file.warn(`${request.method} ${request.path}: ${error.name}: ${error.message}`);
    return response.status(statusFor(error)).json({ ok: false, error: error.message, kind: error.name });
  });

  return application;
}
