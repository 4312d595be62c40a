/**
 * Pan/zoom curve applied to one still image for the length of its section.
 */

export type MotionMovement = 'zoomInFast' | 'diagonalZoom' | 'zoomInSlow' | 'panLeft' | 'zoomOut' | 'static';

/**
 * Offset of the frame centre, as a fraction of frame width (x) and height (y).
 */
export interface FrameOffset {
    readonly x: number;
    readonly y: number;
}

export const CENTERED: FrameOffset = Object.freeze({ x: 0, y: 0 });

export interface MotionPlan {
    readonly assetId: string;
    readonly movement: MotionMovement;
    readonly startScale: number;
    readonly endScale: number;
    readonly startOffset: FrameOffset;
    readonly endOffset: FrameOffset;
    readonly durationSeconds: number;
}
