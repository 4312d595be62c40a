import { MotionGenerator, DEFAULT_MOTION_BANDS } from '../../../src/domain/services/MotionGenerator';
import { asset, profile, section } from '../../helpers/builders';

describe('MotionGenerator', () => {
    const generator = new MotionGenerator();
    const still = asset('img-1', 'image', ['galaxy']);
    const clip = asset('vid-1', 'video', ['galaxy']);
    const shot = section(2, 'main_content', 'narration', { targetDuration: 6.5 });

    it.each([
        [10, 'zoomInFast', 1.0, 1.3],
        [8.5, 'zoomInFast', 1.0, 1.3],
        [8.0, 'diagonalZoom', 1.0, 1.2],
        [7.0, 'zoomInSlow', 1.0, 1.15],
        [6.0, 'zoomInSlow', 1.0, 1.15],
        [5.0, 'panLeft', 1.0, 1.0],
        [4.0, 'zoomOut', 1.1, 1.0],
        [3.0, 'zoomOut', 1.1, 1.0],
        [2.9, 'static', 1.0, 1.0],
        [0, 'static', 1.0, 1.0],
    ])('energy %p plans %s', (energy, movement, startScale, endScale) => {
        const plan = generator.generate(still, profile(energy), shot);

        expect(plan).toMatchObject({ assetId: 'img-1', movement, startScale, endScale, durationSeconds: 6.5 });
    });

    it('drifts diagonally toward the upper left for high energy', () => {
        const plan = generator.generate(still, profile(8), shot);

        expect(plan?.startOffset).toEqual({ x: 0, y: 0 });
        expect(plan?.endOffset).toEqual({ x: -0.05, y: -0.05 });
    });

    it('pans left for medium energy', () => {
        const plan = generator.generate(still, profile(5), shot);

        expect(plan?.endOffset).toEqual({ x: -0.08, y: 0 });
    });

    it('hands out frozen copies of the band offsets', () => {
        const plan = generator.generate(still, profile(5), shot);
        const panBand = DEFAULT_MOTION_BANDS[3];

        expect(plan?.endOffset).not.toBe(panBand.endOffset);
        expect(Object.isFrozen(plan?.endOffset)).toBe(true);
        expect(Object.isFrozen(panBand)).toBe(true);
        expect(Object.isFrozen(panBand.endOffset)).toBe(true);
    });

    it('returns null for video assets', () => {
        expect(generator.generate(clip, profile(9), shot)).toBeNull();
    });

    it('returns null for sections flagged as static', () => {
        const flagged = section(0, 'background', 'narration', { staticVisual: true });

        expect(generator.generate(still, profile(9), flagged)).toBeNull();
    });

    it('describes a movement with its scale range', () => {
        expect(generator.describe('zoomInFast')).toBe('zoomInFast (scale 1.00→1.30)');
    });

    it('accepts injected bands in any order', () => {
        const bands = [DEFAULT_MOTION_BANDS[5], DEFAULT_MOTION_BANDS[0]];
        const twoBand = new MotionGenerator(bands);

        expect(twoBand.generate(still, profile(7), shot)?.movement).toBe('static');
        expect(twoBand.generate(still, profile(9), shot)?.movement).toBe('zoomInFast');
    });

    it('refuses an empty band table', () => {
        expect(() => new MotionGenerator([])).toThrow('MotionGenerator needs at least one energy band');
    });
});
