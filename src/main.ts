#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import type { AppConfig } from './types';
import { loadConfig, resolveAppConfig } from './config';
import { buildWaveTray } from './core/wave-tray';
import { serializeToolpaths, getToolpathStats } from './core/toolpath-exporter';
import { toolpathsToSVG } from './core/svg-exporter';
import { loadClipper } from './lib/clipper';
import { logger } from './lib/logger';

// --- FILE VERSIONING ---
function getNextBaseName(outputDir: string, baseName: string): string {
    let counter = 1;
    while (true) {
        const candidate = `${baseName}_${counter.toString().padStart(3, '0')}`;
        const taken = ['.json', '.svg'].some(ext => fs.existsSync(path.join(outputDir, candidate + ext)));
        if (!taken) {
            return candidate;
        }
        counter++;
    }
}

// --- MAIN RUNNER ---
async function main() {
    try {
        // 1. Get Config (defaults when no file is given)
        const configPath = process.argv[2];
        let config: AppConfig;
        if (configPath) {
            logger.info(`Loading config from: ${configPath}`, 'Main');
            config = loadConfig(configPath);
        } else {
            logger.info('No config file given, using defaults', 'Main');
            config = resolveAppConfig({});
        }

        // 2. Generate Toolpath
        await loadClipper();
        const trayPaths = buildWaveTray(config.params);
        const stats = getToolpathStats(trayPaths);
        logger.info(
            `${stats.pathCount} paths in ${stats.groupCount} infill groups, ${stats.pointCount} points, ${stats.totalLength.toFixed(1)} mm`,
            'Main'
        );

        // 3. Save Files
        const outputDir = path.resolve(process.cwd(), config.outputDir);
        if (!fs.existsSync(outputDir)) {
            fs.mkdirSync(outputDir, { recursive: true });
        }
        const baseName = getNextBaseName(outputDir, config.outputBaseName);

        if (config.export.json) {
            const jsonPath = path.join(outputDir, `${baseName}.json`);
            fs.writeFileSync(jsonPath, JSON.stringify(serializeToolpaths(trayPaths)));
            logger.info(`Saved toolpath to: ${jsonPath}`, 'Main');
        }

        if (config.export.svg) {
            const svgPath = path.join(outputDir, `${baseName}.svg`);
            fs.writeFileSync(svgPath, toolpathsToSVG(trayPaths));
            logger.info(`Saved SVG to: ${svgPath}`, 'Main');
        }
    } catch (err) {
        logger.error(err instanceof Error ? err.message : String(err), 'Main');
        process.exit(1);
    }
}

main();
