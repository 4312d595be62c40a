import nock from 'nock';
import { PixabayAssetClient } from '../../../src/infrastructure/assets/PixabayAssetClient';
import { muteConsole } from '../../helpers/builders';

describe('PixabayAssetClient', () => {
    let client: PixabayAssetClient;

    beforeEach(() => {
        muteConsole();
        client = new PixabayAssetClient('test-key', { retry: { maxAttempts: 1 } });
        nock.cleanAll();
    });

    afterEach(() => {
        nock.cleanAll();
        jest.restoreAllMocks();
    });

    it('should throw if api key is missing', () => {
        expect(() => new PixabayAssetClient('')).toThrow('Pixabay API key is required');
    });

    it('returns nothing for an empty query without calling the API', async () => {
        const scope = nock('https://pixabay.com').get('/api/').query(true).reply(200, { hits: [] });

        await expect(client.search([' '])).resolves.toEqual([]);
        expect(scope.isDone()).toBe(false);
    });

    it('searches clips first when video is preferred', async () => {
        nock('https://pixabay.com')
            .get('/api/videos/')
            .query({ key: 'test-key', safesearch: 'true', q: 'galaxy space night', video_type: 'film', per_page: '10' })
            .reply(200, {
                hits: [{ id: 11, tags: 'Galaxy, stars', videos: { medium: { url: 'https://cdn.test/v11.mp4' } } }],
            });

        const assets = await client.search(['galaxy', 'space', 'night', 'stars'], 'video');

        expect(assets).toEqual([
            { id: 'pixabay-video-11', kind: 'video', tags: ['galaxy', 'stars'], usageCount: 0, url: 'https://cdn.test/v11.mp4' },
        ]);
    });

    it('falls back to images when no clip matches', async () => {
        nock('https://pixabay.com').get('/api/videos/').query(true).reply(200, { hits: [] });
        nock('https://pixabay.com')
            .get('/api/')
            .query(true)
            .reply(200, { hits: [{ id: 5, tags: 'telescope', largeImageURL: 'https://cdn.test/5.jpg' }] });

        const assets = await client.search(['telescope'], 'video');

        expect(assets.map((item) => item.id)).toEqual(['pixabay-image-5']);
    });

    it('searches both kinds without a preference, images first', async () => {
        nock('https://pixabay.com')
            .get('/api/')
            .query(true)
            .reply(200, { hits: [{ id: 1, tags: 'lake', webformatURL: 'https://cdn.test/1.jpg' }] });
        nock('https://pixabay.com')
            .get('/api/videos/')
            .query(true)
            .reply(200, { hits: [{ id: 2, tags: 'lake', videos: { large: { url: 'https://cdn.test/2.mp4' } } }] });

        const assets = await client.search(['lake']);

        expect(assets.map((item) => [item.id, item.url])).toEqual([
            ['pixabay-image-1', 'https://cdn.test/1.jpg'],
            ['pixabay-video-2', 'https://cdn.test/2.mp4'],
        ]);
    });

    it('looks up a single asset by its id', async () => {
        nock('https://pixabay.com')
            .get('/api/')
            .query({ key: 'test-key', safesearch: 'true', id: '5' })
            .reply(200, { hits: [{ id: 5, tags: 'telescope, night' }] });

        const found = await client.getAsset('pixabay-image-5');

        expect(found).toEqual({ id: 'pixabay-image-5', kind: 'image', tags: ['telescope', 'night'], usageCount: 0 });
    });

    it('returns null for ids from other sources', async () => {
        await expect(client.getAsset('img-local')).resolves.toBeNull();
    });

    it('wraps API errors', async () => {
        nock('https://pixabay.com').get('/api/').query(true).reply(400, 'bad key');

        await expect(client.search(['lake'], 'image')).rejects.toThrow(
            'Pixabay search failed: Request failed with status code 400'
        );
    });

    it('retries server errors', async () => {
        const retrying = new PixabayAssetClient('test-key', { retry: { maxAttempts: 2, initialBackoffMs: 1 } });
        nock('https://pixabay.com').get('/api/').query(true).reply(503);
        nock('https://pixabay.com')
            .get('/api/')
            .query(true)
            .reply(200, { hits: [{ id: 9, tags: 'lake' }] });

        const assets = await retrying.search(['lake'], 'image');

        expect(assets.map((item) => item.id)).toEqual(['pixabay-image-9']);
        expect(console.warn).toHaveBeenCalledWith('[Pixabay] Attempt 1 failed, retrying in 1ms');
    });
});
