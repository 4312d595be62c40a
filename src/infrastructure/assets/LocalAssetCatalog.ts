import fs from 'fs';
import path from 'path';
import Ajv from 'ajv';
import { Asset, AssetKind, createAsset, isAssetKind } from '../../domain/entities/Asset';
import { IAssetPoolProvider } from '../../domain/ports/IAssetPoolProvider';

/**
 * Raw record of the material library file. Both the library's own
 * snake_case keys and the camelCase entity keys are accepted.
 */
interface RawAssetRecord {
    id: string;
    type?: string;
    kind?: string;
    name?: string;
    description?: string;
    file_path?: string;
    url?: string;
    tags?: unknown[];
    used_count?: unknown;
    usageCount?: unknown;
    rating?: unknown;
}

const CATALOG_SCHEMA = {
    type: 'array',
    items: {
        type: 'object',
        required: ['id'],
        properties: {
            id: { type: 'string', minLength: 1 },
            type: { type: 'string' },
            kind: { type: 'string' },
            name: { type: 'string' },
            description: { type: 'string' },
            file_path: { type: 'string' },
            url: { type: 'string' },
            tags: { type: 'array' },
        },
    },
};

const ajv = new Ajv({ allErrors: true });
const validateCatalog = ajv.compile<RawAssetRecord[]>(CATALOG_SCHEMA);

interface CatalogEntry {
    asset: Asset;
    /** Lower-cased name and description, searched alongside tags */
    text: string;
}

/**
 * Asset pool backed by a local JSON material library.
 *
 * An asset matches when any query term occurs in one of its tags (or a tag
 * in the term), its name or its description. Results keep catalog order,
 * with the preferred kind listed first.
 */
export class LocalAssetCatalog implements IAssetPoolProvider {
    private entries: CatalogEntry[] = [];
    private loading: Promise<void> | null = null;

    constructor(private readonly catalogPath: string) { }

    /**
     * Builds a catalog that never touches the filesystem.
     */
    static fromAssets(assets: readonly Asset[]): LocalAssetCatalog {
        const catalog = new LocalAssetCatalog('');
        catalog.entries = assets.map((asset) => ({ asset, text: (asset.name ?? '').toLowerCase() }));
        catalog.loading = Promise.resolve();
        return catalog;
    }

    async search(queryTerms: readonly string[], preferredKind?: AssetKind): Promise<Asset[]> {
        await this.ensureLoaded();

        const terms = queryTerms.map((term) => term.trim().toLowerCase()).filter((term) => term.length > 0);
        const matches = this.entries
            .filter((entry) => terms.length === 0 || terms.some((term) => this.matches(entry, term)))
            .map((entry) => entry.asset);

        if (!preferredKind) {
            return matches;
        }
        return [
            ...matches.filter((asset) => asset.kind === preferredKind),
            ...matches.filter((asset) => asset.kind !== preferredKind),
        ];
    }

    async getAsset(id: string): Promise<Asset | null> {
        await this.ensureLoaded();
        return this.entries.find((entry) => entry.asset.id === id)?.asset ?? null;
    }

    private matches(entry: CatalogEntry, term: string): boolean {
        return entry.asset.tags.some((tag) => tag.includes(term) || term.includes(tag)) || entry.text.includes(term);
    }

    /**
     * Concurrent callers share one load; a failed load is retried on the next call.
     */
    private ensureLoaded(): Promise<void> {
        if (!this.loading) {
            this.loading = this.load().catch((error: unknown) => {
                this.loading = null;
                throw error;
            });
        }
        return this.loading;
    }

    private async load(): Promise<void> {
        const absolutePath = path.isAbsolute(this.catalogPath)
            ? this.catalogPath
            : path.resolve(process.cwd(), this.catalogPath);

        if (!fs.existsSync(absolutePath)) {
            console.warn(`[AssetCatalog] Catalog file not found: ${absolutePath}`);
            this.entries = [];
            return;
        }

        console.log(`[AssetCatalog] Loading catalog from: ${absolutePath}`);
        const data: unknown = JSON.parse(await fs.promises.readFile(absolutePath, 'utf-8'));

        if (!validateCatalog(data)) {
            const details = (validateCatalog.errors ?? []).map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`);
            throw new Error(`Asset catalog ${absolutePath} is invalid: ${details.join('; ')}`);
        }

        this.entries = data.flatMap((raw): CatalogEntry[] => {
            const kind = raw.kind ?? raw.type;
            if (!isAssetKind(kind)) {
                console.warn(`[AssetCatalog] Skipping ${raw.id}: unsupported kind "${kind ?? 'none'}"`);
                return [];
            }
            const asset = createAsset({
                id: raw.id,
                kind,
                tags: raw.tags,
                rating: raw.rating,
                usageCount: raw.usageCount ?? raw.used_count,
                name: raw.name,
                url: raw.url ?? raw.file_path,
            });
            return [{ asset, text: `${raw.name ?? ''} ${raw.description ?? ''}`.toLowerCase() }];
        });
        console.log(`[AssetCatalog] Loaded ${this.entries.length} assets`);
    }
}
