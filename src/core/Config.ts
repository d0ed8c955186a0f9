// Config.ts
// Environment + board presets.
// - Environment variables come through dotenv and are validated with zod
// - Presets live in presets.yml next to this file

import "dotenv/config";
import fs from "node:fs";
import _ from "lodash";
import path from "path";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError } from "./Errors";
import { Parameters } from "./Symbols";

/* -------------------------------------------------------------------------- */
/*                                  Presets                                   */
/* -------------------------------------------------------------------------- */

export const BoardPresetSchema = z
    .object({
        height: z.number().int().positive(),
        width: z.number().int().positive(),
        mines: z.number().int().nonnegative(),
    })
    .refine(preset => preset.mines <= preset.height * preset.width, {
        message: "a board cannot hold more mines than cells",
    });

export type BoardPreset = z.infer<typeof BoardPresetSchema>;

const PresetFileSchema = z.object({
    presets: z.record(z.string(), BoardPresetSchema),
});

export const PRESETS_PATH = path.resolve(__dirname, "./presets.yml");

export function parsePresets(yamlText: string): Record<string, BoardPreset> {
    const parsed = PresetFileSchema.safeParse(YAML.parse(yamlText));
    if (!parsed.success) {
        throw new ConfigError(`Invalid presets file: ${parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    }
    return parsed.data.presets;
}

export function loadPresets(filePath: string = PRESETS_PATH): Record<string, BoardPreset> {
    return parsePresets(fs.readFileSync(filePath, "utf8"));
}

export function resolvePreset(name: string, presets: Record<string, BoardPreset> = loadPresets()): BoardPreset {
    if (!_.has(presets, [name])) {
        throw new ConfigError(`Unknown board preset "${name}" (known: ${Object.keys(presets).join(", ")})`);
    }
    return presets[name];
}

/* -------------------------------------------------------------------------- */
/*                                Environment                                 */
/* -------------------------------------------------------------------------- */

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform(value => value === "true" || value === "1");

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(Parameters.DEFAULT_PORT),
    BOARD_PRESET: z.string().min(1).default(Parameters.DEFAULT_PRESET),
    BOARD_SEED: z.coerce.number().int().optional(),
    LOG_DIR: z.string().min(1).default("logs"),
    LOG_TO_FILE: booleanFlag.default("true"),
    LOG_TO_CONSOLE: booleanFlag.default("true"),
});

export type AppConfig = {
    port: number;
    preset: string;
    seed: number | undefined;
    logging: { directory: string; toFile: boolean; toConsole: boolean };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(`Invalid environment: ${parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    }
    const values = parsed.data;
    return {
        port: values.PORT,
        preset: values.BOARD_PRESET,
        seed: values.BOARD_SEED,
        logging: {
            directory: path.resolve(values.LOG_DIR),
            toFile: values.LOG_TO_FILE,
            toConsole: values.LOG_TO_CONSOLE,
        },
    };
}
