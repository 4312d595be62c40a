import fs from 'fs';
import os from 'os';
import path from 'path';
import { LocalAssetCatalog } from '../../../src/infrastructure/assets/LocalAssetCatalog';
import { muteConsole } from '../../helpers/builders';

describe('LocalAssetCatalog', () => {
    let tempDir: string;
    let catalogPath: string;

    beforeAll(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asset-catalog-'));
        catalogPath = path.join(tempDir, 'catalog.json');
        fs.writeFileSync(catalogPath, JSON.stringify([
            {
                id: 'img-sky',
                type: 'image',
                name: 'Night sky',
                description: 'Stars over the desert',
                file_path: 'materials/sky.jpg',
                tags: ['Sky', 'stars'],
                used_count: 2,
                rating: 4,
            },
            {
                id: 'vid-sea',
                kind: 'video',
                name: 'Ocean',
                url: 'https://cdn.test/sea.mp4',
                tags: ['ocean', 'waves'],
                usageCount: 1,
                rating: 7,
            },
            { id: 'aud-theme', type: 'audio', tags: ['music'] },
        ]));
    });

    afterAll(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    beforeEach(() => {
        muteConsole();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('loading', () => {
        it('maps library records onto assets', async () => {
            const catalog = new LocalAssetCatalog(catalogPath);

            await expect(catalog.getAsset('img-sky')).resolves.toEqual({
                id: 'img-sky',
                kind: 'image',
                tags: ['sky', 'stars'],
                rating: 4,
                usageCount: 2,
                name: 'Night sky',
                url: 'materials/sky.jpg',
            });
            await expect(catalog.getAsset('vid-sea')).resolves.toEqual({
                id: 'vid-sea',
                kind: 'video',
                tags: ['ocean', 'waves'],
                usageCount: 1,
                name: 'Ocean',
                url: 'https://cdn.test/sea.mp4',
            });
        });

        it('skips records of unsupported kinds', async () => {
            const catalog = new LocalAssetCatalog(catalogPath);

            await expect(catalog.search([])).resolves.toHaveLength(2);
            await expect(catalog.getAsset('aud-theme')).resolves.toBeNull();
            expect(console.warn).toHaveBeenCalledWith('[AssetCatalog] Skipping aud-theme: unsupported kind "audio"');
        });

        it('treats a missing file as an empty catalog', async () => {
            const catalog = new LocalAssetCatalog(path.join(tempDir, 'missing.json'));

            await expect(catalog.search([])).resolves.toEqual([]);
            await expect(catalog.getAsset('img-sky')).resolves.toBeNull();
        });

        it('rejects a file that does not match the schema', async () => {
            const invalidPath = path.join(tempDir, 'invalid.json');
            fs.writeFileSync(invalidPath, JSON.stringify([{ name: 'no id' }]));

            await expect(new LocalAssetCatalog(invalidPath).search([])).rejects.toThrow(
                `Asset catalog ${invalidPath} is invalid: /0 must have required property 'id'`
            );
        });

        it('reads the file once for concurrent callers', async () => {
            const readFile = jest.spyOn(fs.promises, 'readFile');
            const catalog = new LocalAssetCatalog(catalogPath);

            const [stars, sky, sea] = await Promise.all([
                catalog.search(['stars']),
                catalog.search(['sky']),
                catalog.getAsset('vid-sea'),
            ]);

            expect(readFile).toHaveBeenCalledTimes(1);
            expect(stars[0]).toBe(sky[0]);
            expect(sea?.id).toBe('vid-sea');
        });

        it('retries the load after a failure', async () => {
            const retryPath = path.join(tempDir, 'retry.json');
            fs.writeFileSync(retryPath, JSON.stringify([{ name: 'no id' }]));
            const catalog = new LocalAssetCatalog(retryPath);

            await expect(catalog.search([])).rejects.toThrow('is invalid');

            fs.writeFileSync(retryPath, JSON.stringify([{ id: 'img-fixed', type: 'image', tags: ['fixed'] }]));
            await expect(catalog.getAsset('img-fixed')).resolves.toMatchObject({ id: 'img-fixed', kind: 'image' });
        });
    });

    describe('search', () => {
        let catalog: LocalAssetCatalog;

        beforeEach(() => {
            catalog = new LocalAssetCatalog(catalogPath);
        });

        const ids = async (terms: string[], kind?: 'image' | 'video') =>
            (await catalog.search(terms, kind)).map((item) => item.id);

        it('matches tags in both directions', async () => {
            await expect(ids(['star'])).resolves.toEqual(['img-sky']);
            await expect(ids(['skyline'])).resolves.toEqual(['img-sky']);
        });

        it('matches the name and description', async () => {
            await expect(ids(['desert'])).resolves.toEqual(['img-sky']);
        });

        it('lists the preferred kind first without dropping the others', async () => {
            await expect(ids(['stars', 'ocean'], 'video')).resolves.toEqual(['vid-sea', 'img-sky']);
            await expect(ids(['waves'], 'image')).resolves.toEqual(['vid-sea']);
        });

        it('returns the whole catalog for an empty query', async () => {
            await expect(ids([])).resolves.toEqual(['img-sky', 'vid-sea']);
        });

        it('returns nothing when no term matches', async () => {
            await expect(ids(['volcano'])).resolves.toEqual([]);
        });
    });
});
