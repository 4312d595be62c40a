import Ajv from 'ajv';
import { ScriptSection, SectionLabel, createScriptSection, isSectionLabel } from '../../domain/entities/ScriptSection';
import { ScriptValidationError } from '../../domain/errors/CompositionErrors';

/**
 * One section as written in a script file or request body.
 * Accepts the script generator's snake_case keys and the entity's camelCase keys.
 */
interface RawSection {
    index?: number;
    section?: string;
    label?: string;
    section_name?: string;
    name?: string;
    narration: string;
    visual_notes?: string;
    visualHint?: string;
    duration?: number;
    targetDuration?: number;
    static?: boolean;
    staticVisual?: boolean;
}

interface RawScript {
    title?: string;
    sections: RawSection[];
}

const SECTION_SCHEMA = {
    type: 'object',
    required: ['narration'],
    properties: {
        index: { type: 'integer', minimum: 0 },
        section: { type: 'string' },
        label: { type: 'string' },
        section_name: { type: 'string' },
        name: { type: 'string' },
        narration: { type: 'string' },
        visual_notes: { type: 'string' },
        visualHint: { type: 'string' },
        duration: { type: 'number', exclusiveMinimum: 0 },
        targetDuration: { type: 'number', exclusiveMinimum: 0 },
        static: { type: 'boolean' },
        staticVisual: { type: 'boolean' },
    },
};

const SCRIPT_SCHEMA = {
    type: 'object',
    required: ['sections'],
    properties: {
        title: { type: 'string' },
        sections: { type: 'array', minItems: 1, items: SECTION_SCHEMA },
    },
};

const ajv = new Ajv({ allErrors: true });
const validateScript = ajv.compile<RawScript>(SCRIPT_SCHEMA);

export const DEFAULT_SECTION_DURATION_SECONDS = 5;

const LABEL_ALIASES: Readonly<Record<string, SectionLabel>> = {
    cta: 'call_to_action',
    intro: 'introduction',
    main: 'main_content',
};

/**
 * Name fragments that identify a section's type when no label is given.
 * Checked in order; the first hit wins.
 */
const NAME_KEYWORDS: ReadonlyArray<[SectionLabel, readonly string[]]> = [
    ['hook', ['hook', 'opening', 'teaser', 'attention']],
    ['introduction', ['intro', 'preface', 'overview']],
    ['background', ['background', 'basics', 'foundation', 'context']],
    ['main_content', ['main', 'core', 'content', 'explanation']],
    ['application', ['application', 'practice', 'use case', 'hands-on']],
    ['summary', ['summary', 'recap', 'conclusion', 'wrap']],
    ['call_to_action', ['cta', 'call to action', 'subscribe', 'follow']],
];

/**
 * Resolves a section label: explicit label (aliases allowed, unknown → custom),
 * then keywords in the section name, then main_content.
 */
export function identifySectionLabel(label: string | undefined, name: string | undefined): SectionLabel {
    const explicit = label?.trim().toLowerCase();
    if (explicit) {
        const resolved = LABEL_ALIASES[explicit] ?? explicit;
        return isSectionLabel(resolved) ? resolved : 'custom';
    }

    const lowered = (name ?? '').toLowerCase();
    for (const [candidate, keywords] of NAME_KEYWORDS) {
        if (keywords.some((keyword) => lowered.includes(keyword))) {
            return candidate;
        }
    }
    return 'main_content';
}

/**
 * Validates raw script data and maps it to sections.
 * A bare array of sections is accepted as well as `{ sections: [...] }`.
 * Sections without an explicit index are numbered by position.
 * @throws ScriptValidationError listing every schema violation
 */
export function parseScript(input: unknown): ScriptSection[] {
    const script = Array.isArray(input) ? { sections: input } : input;

    if (!validateScript(script)) {
        const details = (validateScript.errors ?? []).map(
            (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
        );
        throw new ScriptValidationError(`Invalid script: ${details.join('; ')}`, details);
    }

    return script.sections.map((raw, position) => {
        const name = raw.section_name ?? raw.name;
        return createScriptSection({
            index: raw.index ?? position,
            label: identifySectionLabel(raw.section ?? raw.label, name),
            name,
            narration: raw.narration,
            visualHint: raw.visual_notes ?? raw.visualHint,
            targetDuration: raw.duration ?? raw.targetDuration ?? DEFAULT_SECTION_DURATION_SECONDS,
            staticVisual: raw.static ?? raw.staticVisual,
        });
    });
}
