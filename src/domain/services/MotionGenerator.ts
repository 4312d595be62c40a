import { Asset } from '../entities/Asset';
import { CENTERED, FrameOffset, MotionMovement, MotionPlan } from '../entities/MotionPlan';
import { ScriptSection } from '../entities/ScriptSection';
import { SemanticProfile, clampEnergy } from '../entities/SemanticProfile';

/**
 * One energy band of the Ken Burns policy. Bands are checked from the
 * highest `minEnergy` down; the first band the energy reaches wins.
 */
export interface MotionBand {
    readonly minEnergy: number;
    readonly movement: MotionMovement;
    readonly startScale: number;
    readonly endScale: number;
    readonly startOffset: FrameOffset;
    readonly endOffset: FrameOffset;
}

function freezeBand(band: MotionBand): MotionBand {
    return Object.freeze({
        ...band,
        startOffset: Object.freeze({ ...band.startOffset }),
        endOffset: Object.freeze({ ...band.endOffset }),
    });
}

export const DEFAULT_MOTION_BANDS: readonly MotionBand[] = Object.freeze(([
    { minEnergy: 8.5, movement: 'zoomInFast', startScale: 1.0, endScale: 1.3, startOffset: CENTERED, endOffset: CENTERED },
    { minEnergy: 7.5, movement: 'diagonalZoom', startScale: 1.0, endScale: 1.2, startOffset: CENTERED, endOffset: { x: -0.05, y: -0.05 } },
    { minEnergy: 6.0, movement: 'zoomInSlow', startScale: 1.0, endScale: 1.15, startOffset: CENTERED, endOffset: CENTERED },
    { minEnergy: 4.5, movement: 'panLeft', startScale: 1.0, endScale: 1.0, startOffset: CENTERED, endOffset: { x: -0.08, y: 0 } },
    // Low-energy content must not look busier than it is
    { minEnergy: 3.0, movement: 'zoomOut', startScale: 1.1, endScale: 1.0, startOffset: CENTERED, endOffset: CENTERED },
    { minEnergy: 0, movement: 'static', startScale: 1.0, endScale: 1.0, startOffset: CENTERED, endOffset: CENTERED },
] satisfies MotionBand[]).map(freezeBand));

/**
 * Produces pan/zoom curves for still images from the section's energy.
 */
export class MotionGenerator {
    private readonly bands: readonly MotionBand[];

    constructor(bands: readonly MotionBand[] = DEFAULT_MOTION_BANDS) {
        if (bands.length === 0) {
            throw new Error('MotionGenerator needs at least one energy band');
        }
        this.bands = bands.map(freezeBand).sort((a, b) => b.minEnergy - a.minEnergy);
    }

    /**
     * @returns null for video assets (motion is intrinsic) and for sections flagged static
     */
    generate(asset: Asset, profile: SemanticProfile, section: ScriptSection): MotionPlan | null {
        if (asset.kind === 'video' || section.staticVisual) {
            return null;
        }

        const band = this.bandFor(profile.energy);
        return Object.freeze({
            assetId: asset.id,
            movement: band.movement,
            startScale: band.startScale,
            endScale: band.endScale,
            startOffset: Object.freeze({ ...band.startOffset }),
            endOffset: Object.freeze({ ...band.endOffset }),
            durationSeconds: section.targetDuration,
        });
    }

    describe(movement: MotionMovement): string {
        const band = this.bands.find((candidate) => candidate.movement === movement);
        if (!band) {
            return movement;
        }
        return `${movement} (scale ${band.startScale.toFixed(2)}→${band.endScale.toFixed(2)})`;
    }

    private bandFor(energy: number): MotionBand {
        const level = clampEnergy(energy);
        return this.bands.find((band) => level >= band.minEnergy) ?? this.bands[this.bands.length - 1];
    }
}
