// Infill strategy applied to the annulus between the outer wall and the hole
export type InfillMode =
    | 'line'        // Cross-hatched scanlines, rotated every layer
    | 'concentric'; // Evenly spaced rings around the hole

export interface WaveTrayParams {
    layerCount: number;            // Number of stacked layers
    layerHeightMm: number;         // Layer thickness [mm]
    baseRadiusMm: number;          // Radius at the bottom of the profile [mm]
    radialGrowthMm: number;        // Radius gained across the sigmoid transition [mm]
    waveAmplitudeMm: number;       // Ripple amplitude on top of the profile [mm]
    waveFrequency: number;         // Ripple cycles per revolution
    waveSampleCount: number;       // Points per outer wall
    holeSampleCount: number;       // Points per hole circle (also used for rings)
    holeRadiusMm: number;          // Central hole radius [mm]
    holeLayerLimit: number;        // Hole + infill are built for layers below this index
    holeOffsetMm: number;          // Inward offset of the hole wall [mm]
    infillMode: InfillMode;
    infillDistanceMm: number;      // Scanline spacing [mm]
    infillAngleOffsetRad: number;  // Hatch angle of layer 0
    infillAngleStepRad: number;    // Hatch rotation per layer
    concentricPitchMm: number;     // Distance between rings [mm]
    concentricClearanceMm: number; // Gap kept from the hole and the wave trough [mm]
}

export interface ExportConfig {
    json: boolean;
    svg: boolean;
}

export interface AppConfig {
    outputBaseName: string; // e.g., "wave_tray"
    outputDir: string;      // Relative to the working directory
    export: ExportConfig;
    params: WaveTrayParams;
}
