/**
 * ScriptSection Domain Entity
 *
 * One narrated beat of a script: a typed label, the narration text,
 * an optional visual hint and the time it should stay on screen.
 */

/**
 * Closed vocabulary of section types.
 */
export const SECTION_LABELS = [
    'hook',
    'introduction',
    'background',
    'main_content',
    'application',
    'summary',
    'call_to_action',
    'custom',
] as const;

export type SectionLabel = typeof SECTION_LABELS[number];

/**
 * A single script section. Immutable once loaded.
 */
export interface ScriptSection {
    /** Ordinal position; unique within a script and defines sequence order */
    readonly index: number;
    /** Section type */
    readonly label: SectionLabel;
    /** Display title of the section */
    readonly name?: string;
    /** Narration text (source of keyword signals) */
    readonly narration: string;
    /** Free text describing the desired imagery */
    readonly visualHint?: string;
    /** Seconds the section stays on screen */
    readonly targetDuration: number;
    /** When true, still images in this section get no pan/zoom */
    readonly staticVisual?: boolean;
}

export function isSectionLabel(value: unknown): value is SectionLabel {
    return typeof value === 'string' && (SECTION_LABELS as readonly string[]).includes(value);
}

/**
 * Creates a ScriptSection with trimmed text fields.
 */
export function createScriptSection(params: {
    index: number;
    label: SectionLabel;
    narration: string;
    targetDuration: number;
    name?: string;
    visualHint?: string;
    staticVisual?: boolean;
}): ScriptSection {
    const name = params.name?.trim();
    const visualHint = params.visualHint?.trim();
    const section: ScriptSection = {
        index: params.index,
        label: params.label,
        narration: params.narration.trim(),
        targetDuration: params.targetDuration,
        ...(name ? { name } : {}),
        ...(visualHint ? { visualHint } : {}),
        ...(params.staticVisual ? { staticVisual: true } : {}),
    };
    return Object.freeze(section);
}
