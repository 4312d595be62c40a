import axios from 'axios';
import { Asset, AssetKind, createAsset } from '../../domain/entities/Asset';
import { IAssetPoolProvider } from '../../domain/ports/IAssetPoolProvider';
import { RetryOptions, isRetryableHttpError, withRetry } from '../http/RetryUtils';

interface PixabayImageHit {
    id: number;
    tags: string;
    largeImageURL?: string;
    webformatURL?: string;
}

interface PixabayVideoHit {
    id: number;
    tags: string;
    videos?: {
        large?: { url?: string };
        medium?: { url?: string };
        small?: { url?: string };
    };
}

interface PixabayResponse<T> {
    total?: number;
    hits?: T[];
}

export interface PixabayClientOptions {
    baseUrl?: string;
    /** Results requested per kind */
    perPage?: number;
    retry?: RetryOptions;
}

const ASSET_ID_PATTERN = /^pixabay-(image|video)-(\d+)$/;

/**
 * Pixabay Asset Client
 * Remote stock-media pool: images from /api/, clips from /api/videos/.
 * Stock results carry no rating and no usage history.
 */
export class PixabayAssetClient implements IAssetPoolProvider {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly perPage: number;
    private readonly retry: RetryOptions;

    constructor(apiKey: string, options: PixabayClientOptions = {}) {
        if (!apiKey) {
            throw new Error('Pixabay API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = options.baseUrl ?? 'https://pixabay.com';
        this.perPage = options.perPage ?? 10;
        this.retry = options.retry ?? {};
    }

    async search(queryTerms: readonly string[], preferredKind?: AssetKind): Promise<Asset[]> {
        const query = queryTerms.slice(0, 3).join(' ').trim();
        if (!query) {
            return [];
        }
        console.log(`[Pixabay] Searching for: "${query}" (prefer ${preferredKind ?? 'any'})`);

        if (preferredKind === 'video') {
            const videos = await this.searchVideos(query);
            return videos.length > 0 ? videos : this.searchImages(query);
        }
        if (preferredKind === 'image') {
            return this.searchImages(query);
        }

        const [images, videos] = await Promise.all([this.searchImages(query), this.searchVideos(query)]);
        return [...images, ...videos];
    }

    async getAsset(id: string): Promise<Asset | null> {
        const match = ASSET_ID_PATTERN.exec(id);
        if (!match) {
            return null;
        }
        const params = { id: match[2] };
        const assets = match[1] === 'video'
            ? await this.fetchVideos(params)
            : await this.fetchImages(params);
        return assets[0] ?? null;
    }

    private searchImages(query: string): Promise<Asset[]> {
        return this.fetchImages({ q: query, image_type: 'photo', per_page: this.perPage });
    }

    private searchVideos(query: string): Promise<Asset[]> {
        return this.fetchVideos({ q: query, video_type: 'film', per_page: this.perPage });
    }

    private async fetchImages(params: Record<string, string | number>): Promise<Asset[]> {
        const data = await this.get<PixabayImageHit>('/api/', params);
        return (data.hits ?? []).map((hit) =>
            createAsset({
                id: `pixabay-image-${hit.id}`,
                kind: 'image',
                tags: splitTags(hit.tags),
                url: hit.largeImageURL || hit.webformatURL,
            })
        );
    }

    private async fetchVideos(params: Record<string, string | number>): Promise<Asset[]> {
        const data = await this.get<PixabayVideoHit>('/api/videos/', params);
        return (data.hits ?? []).map((hit) =>
            createAsset({
                id: `pixabay-video-${hit.id}`,
                kind: 'video',
                tags: splitTags(hit.tags),
                url: hit.videos?.large?.url || hit.videos?.medium?.url || hit.videos?.small?.url,
            })
        );
    }

    private async get<T>(endpoint: string, params: Record<string, string | number>): Promise<PixabayResponse<T>> {
        try {
            const response = await withRetry(
                () => axios.get<PixabayResponse<T>>(`${this.baseUrl}${endpoint}`, {
                    params: { key: this.apiKey, safesearch: true, ...params },
                    timeout: 15000,
                }),
                {
                    isRetryable: isRetryableHttpError,
                    onRetry: (attempt, _error, delay) =>
                        console.warn(`[Pixabay] Attempt ${attempt} failed, retrying in ${delay}ms`),
                    ...this.retry,
                }
            );
            return response.data;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                console.error('[Pixabay] API Error:', error.response?.data || error.message);
                throw new Error(`Pixabay search failed: ${error.message}`);
            }
            throw error;
        }
    }
}

function splitTags(tags: string | undefined): string[] {
    return (tags ?? '').split(',').map((tag) => tag.trim()).filter((tag) => tag.length > 0);
}
