import { createAsset, dedupeAssets, normalizeTags } from '../../../../src/domain/entities/Asset';
import { createScriptSection, isSectionLabel } from '../../../../src/domain/entities/ScriptSection';
import { createSemanticProfile } from '../../../../src/domain/entities/SemanticProfile';
import { compareCandidates } from '../../../../src/domain/entities/ScoredCandidate';
import { TimelineEntry, createTimelinePlan, deepFreeze } from '../../../../src/domain/entities/TimelinePlan';
import { asset, profile, section } from '../../../helpers/builders';

describe('Domain entities', () => {
    describe('Asset', () => {
        it('drops unusable metadata', () => {
            const created = createAsset({ id: 'a', kind: 'image', tags: ['Sky', 'sky', 3, ' '], rating: 9, usageCount: -2 });

            expect(created).toEqual({ id: 'a', kind: 'image', tags: ['sky'], usageCount: 0 });
        });

        it('keeps a valid rating and floors the usage count', () => {
            expect(createAsset({ id: 'a', kind: 'video', rating: 0, usageCount: 2.7 })).toEqual({
                id: 'a',
                kind: 'video',
                tags: [],
                rating: 0,
                usageCount: 2,
            });
        });

        it('normalizes tags and dedupes assets by id', () => {
            expect(normalizeTags([' A ', 'a', 'B'])).toEqual(['a', 'b']);
            expect(dedupeAssets([asset('x', 'image', ['one']), asset('x', 'video', []), asset('y', 'image', [])]).map((item) => item.kind))
                .toEqual(['image', 'image']);
        });
    });

    describe('ScriptSection', () => {
        it('trims text and omits empty optional fields', () => {
            const created = createScriptSection({
                index: 1,
                label: 'hook',
                narration: '  Hello  ',
                targetDuration: 3,
                visualHint: '  ',
                name: ' Opening ',
            });

            expect(created).toEqual({ index: 1, label: 'hook', narration: 'Hello', targetDuration: 3, name: 'Opening' });
            expect(Object.isFrozen(created)).toBe(true);
        });

        it('recognizes the label vocabulary', () => {
            expect(isSectionLabel('call_to_action')).toBe(true);
            expect(isSectionLabel('cta')).toBe(false);
            expect(isSectionLabel(3)).toBe(false);
        });
    });

    describe('SemanticProfile', () => {
        it('derives the visual intensity from energy', () => {
            expect(createSemanticProfile({ energy: 7.5, emotion: 'focus', pace: 'medium' }).visualIntensity).toBe('high');
            expect(createSemanticProfile({ energy: 5, emotion: 'focus', pace: 'medium' }).visualIntensity).toBe('medium');
            expect(createSemanticProfile({ energy: 4.9, emotion: 'focus', pace: 'medium' }).visualIntensity).toBe('low');
        });
    });

    describe('compareCandidates', () => {
        it('sorts by score descending, then id ascending', () => {
            const breakdown = { typeMatch: 0, tagOverlap: 0, keywordMatch: 0, ratingBonus: 0, usageBonus: 0 };
            const candidates = [
                { asset: asset('b', 'image', []), totalScore: 10, breakdown },
                { asset: asset('c', 'image', []), totalScore: 20, breakdown },
                { asset: asset('a', 'image', []), totalScore: 10, breakdown },
            ];

            expect(candidates.sort(compareCandidates).map((candidate) => candidate.asset.id)).toEqual(['c', 'a', 'b']);
        });
    });

    describe('createTimelinePlan', () => {
        const entry = (index: number, duration: number, resolution: TimelineEntry['resolution']): TimelineEntry => ({
            section: section(index, 'main_content', 'text', { targetDuration: duration }),
            profile: profile(5),
            chosenAsset: null,
            candidate: null,
            motionPlan: null,
            inboundTransition: index === 0
                ? null
                : {
                    fromIndex: index - 1,
                    toIndex: index,
                    effect: 'crossfade',
                    durationSeconds: 1.5,
                    reason: 'test',
                    rule: 'pair',
                    params: {},
                },
            resolution,
            deficiencies: resolution === 'missing'
                ? [{ sectionIndex: index, code: 'asset_missing', message: 'none', bestScore: null }]
                : [],
        });

        it('collects transitions and deficiencies and sums durations', () => {
            const plan = createTimelinePlan([entry(0, 1.1, 'scored'), entry(1, 2.2, 'missing'), entry(2, 0.3, 'override')]);

            expect(plan.transitions.map((transition) => transition.toIndex)).toEqual([1, 2]);
            expect(plan.deficiencies).toEqual([{ sectionIndex: 1, code: 'asset_missing', message: 'none', bestScore: null }]);
            expect(plan.totalDurationSeconds).toBe(3.6);
            expect(plan.fullyResolved).toBe(false);
        });

        it('is fully resolved when every entry was scored or overridden', () => {
            expect(createTimelinePlan([entry(0, 1, 'scored'), entry(1, 1, 'override')]).fullyResolved).toBe(true);
        });

        it('freezes the whole plan', () => {
            const plan = createTimelinePlan([entry(0, 1, 'placeholder')]);

            expect(Object.isFrozen(plan)).toBe(true);
            expect(Object.isFrozen(plan.entries)).toBe(true);
            expect(Object.isFrozen(plan.entries[0].section)).toBe(true);
            expect(Object.isFrozen(plan.deficiencies)).toBe(true);
        });
    });

    describe('deepFreeze', () => {
        it('reaches children of an already frozen parent', () => {
            const offset = { x: -0.08, y: 0 };
            const parent = Object.freeze({ offset });

            deepFreeze({ parent });

            expect(Object.isFrozen(offset)).toBe(true);
        });

        it('stops at cycles', () => {
            const node: { name: string; self?: object } = { name: 'loop' };
            node.self = node;

            expect(deepFreeze(node)).toBe(node);
            expect(Object.isFrozen(node)).toBe(true);
        });
    });
});
