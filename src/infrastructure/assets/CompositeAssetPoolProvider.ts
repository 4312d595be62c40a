import { Asset, AssetKind, dedupeAssets } from '../../domain/entities/Asset';
import { IAssetPoolProvider } from '../../domain/ports/IAssetPoolProvider';

/**
 * Queries several providers in parallel and merges their results.
 * Earlier providers win on duplicate ids. A failing provider is skipped;
 * the search only fails when every provider failed.
 */
export class CompositeAssetPoolProvider implements IAssetPoolProvider {
    constructor(private readonly providers: readonly IAssetPoolProvider[]) {
        if (providers.length === 0) {
            throw new Error('CompositeAssetPoolProvider needs at least one provider');
        }
    }

    async search(queryTerms: readonly string[], preferredKind?: AssetKind): Promise<Asset[]> {
        const results = await Promise.allSettled(
            this.providers.map((provider) => provider.search(queryTerms, preferredKind))
        );

        const assets: Asset[] = [];
        const failures: string[] = [];
        for (const result of results) {
            if (result.status === 'fulfilled') {
                assets.push(...result.value);
            } else {
                failures.push(describeError(result.reason));
            }
        }

        if (failures.length === results.length) {
            throw new Error(`All asset providers failed: ${failures.join('; ')}`);
        }
        for (const failure of failures) {
            console.warn(`[AssetPool] Provider failed, continuing without it: ${failure}`);
        }
        return dedupeAssets(assets);
    }

    async getAsset(id: string): Promise<Asset | null> {
        for (const provider of this.providers) {
            try {
                const asset = await provider.getAsset(id);
                if (asset) {
                    return asset;
                }
            } catch (error) {
                console.warn(`[AssetPool] Lookup of ${id} failed: ${describeError(error)}`);
            }
        }
        return null;
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
