/**
 * Asset Domain Entity
 *
 * A candidate visual (still image or video clip) owned by the material store.
 * The composition core treats it as a read-only value object.
 */

export type AssetKind = 'image' | 'video';

export const MAX_RATING = 5;

export interface Asset {
    /** Stable identifier, also the ranking tie-breaker */
    readonly id: string;
    readonly kind: AssetKind;
    /** Lower-cased descriptive tags */
    readonly tags: readonly string[];
    /** Editorial rating 0-5, absent when unrated */
    readonly rating?: number;
    /** How many finished videos already used this asset */
    readonly usageCount: number;
    /** Human-readable name */
    readonly name?: string;
    /** Location of the media (file path or URL) */
    readonly url?: string;
}

export function isAssetKind(value: unknown): value is AssetKind {
    return value === 'image' || value === 'video';
}

export function isValidRating(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_RATING;
}

/**
 * Lower-cases, trims and de-duplicates tags, dropping empty ones.
 */
export function normalizeTags(tags: readonly unknown[]): string[] {
    const normalized = tags
        .filter((tag): tag is string => typeof tag === 'string')
        .map((tag) => tag.trim().toLowerCase())
        .filter((tag) => tag.length > 0);
    return [...new Set(normalized)];
}

/**
 * Creates an Asset, dropping metadata that cannot be used for scoring.
 */
export function createAsset(params: {
    id: string;
    kind: AssetKind;
    tags?: readonly unknown[];
    rating?: unknown;
    usageCount?: unknown;
    name?: string;
    url?: string;
}): Asset {
    const usage = params.usageCount;
    return {
        id: params.id,
        kind: params.kind,
        tags: normalizeTags(params.tags ?? []),
        ...(isValidRating(params.rating) ? { rating: params.rating } : {}),
        usageCount: typeof usage === 'number' && Number.isFinite(usage) && usage > 0 ? Math.floor(usage) : 0,
        ...(params.name ? { name: params.name } : {}),
        ...(params.url ? { url: params.url } : {}),
    };
}

/**
 * Drops later duplicates of the same asset id, keeping the first occurrence.
 */
export function dedupeAssets(assets: readonly Asset[]): Asset[] {
    const seen = new Set<string>();
    const unique: Asset[] = [];
    for (const asset of assets) {
        if (!seen.has(asset.id)) {
            seen.add(asset.id);
            unique.push(asset);
        }
    }
    return unique;
}
