import * as clipperLib from 'js-angusj-clipper';
import { logger } from './logger';

let instance: clipperLib.ClipperLibWrapper | null = null;
let loading: Promise<clipperLib.ClipperLibWrapper> | null = null;

/**
 * Loads the clipper instance once (WASM, asm.js when WASM is unavailable).
 * Offsets are taken synchronously, so this has to resolve before a build starts.
 */
export function loadClipper(): Promise<clipperLib.ClipperLibWrapper> {
    if (instance) return Promise.resolve(instance);

    // Prevent multiple simultaneous initializations
    if (!loading) {
        loading = clipperLib
            .loadNativeClipperLibInstanceAsync(clipperLib.NativeClipperLibRequestedFormat.WasmWithAsmJsFallback)
            .then(lib => {
                instance = lib;
                logger.debug('Clipper instance loaded', 'Clipper');
                return lib;
            })
            .catch((err: unknown) => {
                loading = null;
                throw err;
            });
    }
    return loading;
}

export function getClipper(): clipperLib.ClipperLibWrapper {
    if (!instance) {
        throw new Error('Clipper is not loaded yet, await loadClipper() before building toolpaths');
    }
    return instance;
}
