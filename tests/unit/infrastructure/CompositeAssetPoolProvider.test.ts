import { CompositeAssetPoolProvider } from '../../../src/infrastructure/assets/CompositeAssetPoolProvider';
import { IAssetPoolProvider } from '../../../src/domain/ports/IAssetPoolProvider';
import { asset, muteConsole } from '../../helpers/builders';

describe('CompositeAssetPoolProvider', () => {
    let local: IAssetPoolProvider;
    let remote: IAssetPoolProvider;
    let broken: IAssetPoolProvider;

    beforeEach(() => {
        muteConsole();
        local = {
            search: jest.fn().mockResolvedValue([asset('a', 'image', ['lake']), asset('shared', 'image', ['lake'])]),
            getAsset: jest.fn().mockResolvedValue(null),
        };
        remote = {
            search: jest.fn().mockResolvedValue([asset('shared', 'video', ['lake']), asset('b', 'video', ['lake'])]),
            getAsset: jest.fn().mockResolvedValue(asset('b', 'video', ['lake'])),
        };
        broken = {
            search: jest.fn().mockRejectedValue(new Error('offline')),
            getAsset: jest.fn().mockRejectedValue(new Error('offline')),
        };
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('needs at least one provider', () => {
        expect(() => new CompositeAssetPoolProvider([])).toThrow('CompositeAssetPoolProvider needs at least one provider');
    });

    it('merges results, earlier providers winning on duplicate ids', async () => {
        const assets = await new CompositeAssetPoolProvider([local, remote]).search(['lake'], 'video');

        expect(assets.map((item) => [item.id, item.kind])).toEqual([
            ['a', 'image'],
            ['shared', 'image'],
            ['b', 'video'],
        ]);
        expect(remote.search).toHaveBeenCalledWith(['lake'], 'video');
    });

    it('skips a failing provider', async () => {
        const assets = await new CompositeAssetPoolProvider([broken, remote]).search(['lake']);

        expect(assets.map((item) => item.id)).toEqual(['shared', 'b']);
        expect(console.warn).toHaveBeenCalledWith('[AssetPool] Provider failed, continuing without it: offline');
    });

    it('fails when every provider failed', async () => {
        await expect(new CompositeAssetPoolProvider([broken, broken]).search(['lake']))
            .rejects.toThrow('All asset providers failed: offline; offline');
    });

    it('returns the first provider hit for a lookup', async () => {
        const found = await new CompositeAssetPoolProvider([broken, local, remote]).getAsset('b');

        expect(found?.id).toBe('b');
        expect(local.getAsset).toHaveBeenCalledWith('b');
    });

    it('returns null when no provider knows the asset', async () => {
        await expect(new CompositeAssetPoolProvider([local]).getAsset('zzz')).resolves.toBeNull();
    });
});
