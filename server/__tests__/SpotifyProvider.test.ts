import { describe, it, expect, vi } from 'vitest';
import { SpotifyProvider, mapArtist, mapTrack, type CatalogApi } from '../providers/spotify/SpotifyProvider';
import type { SpotifyTrack } from '../providers/spotify/spotifyApi';

function spotifyTrack(n: number): SpotifyTrack {
    return {
        uri: `spotify:track:${n}`,
        name: `Hit ${n}`,
        duration_ms: 180_000 + n,
        artists: [{ name: 'Robyn' }, { name: 'Featured Guest' }],
        album: { images: [{ url: `https://img.example/${n}.jpg` }] },
    };
}

describe('mapArtist', () => {
    it('takes the first image', () => {
        expect(mapArtist({
            id: 'r1',
            name: 'Robyn',
            images: [{ url: 'https://img.example/large.jpg' }, { url: 'https://img.example/small.jpg' }],
        })).toEqual({ id: 'r1', name: 'Robyn', imageUrl: 'https://img.example/large.jpg' });
    });

    it('has no image when Spotify has none', () => {
        expect(mapArtist({ id: 'r1', name: 'Robyn', images: [] }).imageUrl).toBeNull();
    });
});

describe('mapTrack', () => {
    it('keeps the playable fields and the lead artist', () => {
        expect(mapTrack(spotifyTrack(1))).toEqual({
            uri: 'spotify:track:1',
            name: 'Hit 1',
            durationMs: 180_001,
            artistName: 'Robyn',
            albumImageUrl: 'https://img.example/1.jpg',
        });
    });

    it('fills in a missing artist and album', () => {
        const bare: SpotifyTrack = { uri: 'spotify:track:x', name: 'X', duration_ms: 1000, artists: [] };
        expect(mapTrack(bare)).toMatchObject({ artistName: 'Unknown', albumImageUrl: null });
    });
});

describe('SpotifyProvider', () => {
    function fakeApi(tracks: SpotifyTrack[]) {
        return {
            searchArtists: vi.fn<CatalogApi['searchArtists']>(async () => [{ id: 'r1', name: 'Robyn', images: [] }]),
            fetchArtistTopTracks: vi.fn<CatalogApi['fetchArtistTopTracks']>(async () => tracks),
        };
    }

    it('pads a short top-tracks list to ten slots', async () => {
        const api = fakeApi([spotifyTrack(1), spotifyTrack(2), spotifyTrack(3)]);
        const provider = new SpotifyProvider(api, 'SE');

        const slots = await provider.getTopTrackSlots('r1');

        expect(api.fetchArtistTopTracks).toHaveBeenCalledWith('r1', 'SE');
        expect(slots).toHaveLength(10);
        expect(slots.map((t) => t?.uri ?? null)).toEqual([
            'spotify:track:1', 'spotify:track:2', 'spotify:track:3',
            null, null, null, null, null, null, null,
        ]);
    });

    it('maps search results', async () => {
        const api = fakeApi([]);
        const provider = new SpotifyProvider(api, 'SE');

        await expect(provider.searchArtists('robyn', 3)).resolves.toEqual([{ id: 'r1', name: 'Robyn', imageUrl: null }]);
        expect(api.searchArtists).toHaveBeenCalledWith('robyn', 3);
    });
});
