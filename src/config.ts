import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { AppConfig } from './types';
import { createWaveTrayParams, waveTrayParamsShape } from './core/params';

const appConfigSchema = z.object({
    outputBaseName: z.string().min(1).default('wave_tray'),
    outputDir: z.string().min(1).default('drawings'),
    export: z.object({
        json: z.boolean().default(true),
        svg: z.boolean().default(true)
    }).default({}),
    params: waveTrayParamsShape.partial().default({})
});

/**
 * Validates a raw config object; missing fields take their defaults.
 */
export function resolveAppConfig(raw: unknown): AppConfig {
    const result = appConfigSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new Error(`Invalid config at "${issue.path.join('.') || '(root)'}": ${issue.message}`);
    }

    const { params, ...rest } = result.data;
    return { ...rest, params: createWaveTrayParams(params) };
}

// --- CONFIG LOADING ---
export function loadConfig(configPath: string): AppConfig {
    const absPath = path.isAbsolute(configPath)
        ? configPath
        : path.join(process.cwd(), configPath);

    if (!fs.existsSync(absPath)) {
        throw new Error(`Config file not found: ${absPath}`);
    }

    const raw: unknown = JSON.parse(fs.readFileSync(absPath, 'utf8'));
    return resolveAppConfig(raw);
}
