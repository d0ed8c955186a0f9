// src/core/SessionStore.ts
import { createStore } from 'zustand/vanilla';
import _ from "lodash";
import type { BoardOptions } from "./Board";
import { GameSession } from "./GameSession";
import { LogFunctions } from "./LogFunctions";
// A zustand store of running game sessions, keyed by session id. Each driver
// (console, HTTP server) creates its own store; there is no module-level instance.

export interface SessionStore {
    sessions: Record<string, GameSession>;
    create: (options: BoardOptions) => GameSession;
    get: (id: string) => GameSession | undefined;
    remove: (id: string) => boolean;
    resetAll: () => void;
}

export type SessionStoreApi = ReturnType<typeof createSessionStore>;

export const createSessionStore = () => createStore<SessionStore>((set, get) => ({
    sessions: {},

    create: (options) => {
        const session = GameSession.create(options);
        set(state => ({ sessions: { ...state.sessions, [session.id]: session } }));
        LogFunctions.file.info(`Session ${session.id} created (${options.height}x${options.width}, ${options.mines} mines, seed ${options.seed ?? "none"})`);
        return session;
    },

    get: (id) => (_.has(get().sessions, [id]) ? get().sessions[id] : undefined),

    remove: (id) => {
        if (!_.has(get().sessions, [id])) return false;
        set(state => ({ sessions: _.omit(state.sessions, id) }));
        return true;
    },

    resetAll: () => set({ sessions: {} }),
}));
