import { ScriptSection, SectionLabel } from '../domain/entities/ScriptSection';
import { deriveSectionKeywords } from '../domain/services/AssetScorer';
import { CompositionOrchestrator } from './CompositionOrchestrator';

export type CoverageStatus = 'full' | 'partial' | 'none';

export interface SectionCoverage {
    sectionIndex: number;
    label: SectionLabel;
    name?: string;
    status: CoverageStatus;
    /** Candidates of the needed kind at or above the minimum score, capped at the full-coverage count */
    availableAssets: number;
}

export interface MaterialSuggestion {
    sectionIndex: number;
    visualHint: string;
    keywords: string[];
    action: string;
}

export interface CoverageReport {
    totalSections: number;
    fullyCovered: number;
    partiallyCovered: number;
    notCovered: number;
    /** Percentage of fully covered sections, two decimals */
    coverageRate: number;
    details: SectionCoverage[];
    suggestions: MaterialSuggestion[];
}

/** Qualifying candidates needed for a section to count as fully covered */
export const FULL_COVERAGE_CANDIDATES = 3;

/**
 * Reports how well the asset pool covers a script before composing it.
 */
export class MaterialCoverageService {
    constructor(private readonly orchestrator: CompositionOrchestrator) { }

    async analyzeCoverage(
        sections: readonly ScriptSection[],
        options: { minimumScore?: number; signal?: AbortSignal } = {}
    ): Promise<CoverageReport> {
        const ranked = await this.orchestrator.compose(sections, {
            dryRun: true,
            candidateLimit: FULL_COVERAGE_CANDIDATES,
            minimumScore: options.minimumScore,
            signal: options.signal,
        });
        const byIndex = new Map(sections.map((section) => [section.index, section]));

        const details: SectionCoverage[] = ranked.map((entry) => {
            const available = Math.min(entry.qualifyingCount, FULL_COVERAGE_CANDIDATES);
            const name = byIndex.get(entry.sectionIndex)?.name;
            return {
                sectionIndex: entry.sectionIndex,
                label: entry.label,
                ...(name ? { name } : {}),
                status: statusFor(available),
                availableAssets: available,
            };
        });

        const fullyCovered = details.filter((detail) => detail.status === 'full').length;
        const partiallyCovered = details.filter((detail) => detail.status === 'partial').length;
        const totalSections = details.length;

        const suggestions = details
            .filter((detail) => detail.status === 'none')
            .flatMap((detail): MaterialSuggestion[] => {
                const section = byIndex.get(detail.sectionIndex);
                if (!section?.visualHint) {
                    return [];
                }
                return [{
                    sectionIndex: section.index,
                    visualHint: section.visualHint,
                    keywords: deriveSectionKeywords(section).slice(0, 5),
                    action: 'Add matching material to the library or generate it',
                }];
            });

        const report: CoverageReport = {
            totalSections,
            fullyCovered,
            partiallyCovered,
            notCovered: totalSections - fullyCovered - partiallyCovered,
            coverageRate: totalSections > 0 ? Math.round((fullyCovered / totalSections) * 10000) / 100 : 0,
            details,
            suggestions,
        };

        console.log(
            `[Coverage] ${report.fullyCovered}/${report.totalSections} sections fully covered (${report.coverageRate}%)`
        );
        return report;
    }
}

function statusFor(available: number): CoverageStatus {
    if (available >= FULL_COVERAGE_CANDIDATES) return 'full';
    if (available > 0) return 'partial';
    return 'none';
}
