import { Asset, AssetKind } from '../entities/Asset';

/**
 * IAssetPoolProvider - Port for candidate asset retrieval.
 * Implementations: LocalAssetCatalog, PixabayAssetClient, CompositeAssetPoolProvider
 */
export interface IAssetPoolProvider {
    /**
     * Finds candidate assets for a set of query terms.
     * @param queryTerms Keywords derived from the section
     * @param preferredKind Hint; providers list or fetch this kind first, the scorer decides
     * @returns Candidates; an empty list means "no candidates", not an error
     */
    search(queryTerms: readonly string[], preferredKind?: AssetKind): Promise<Asset[]>;

    /**
     * Looks up a single asset, used for manual overrides and placeholders.
     */
    getAsset(id: string): Promise<Asset | null>;
}
