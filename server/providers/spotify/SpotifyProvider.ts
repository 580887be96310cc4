import type { MusicCatalog } from '../types';
import type { ArtistData, TrackData, TrackSlot } from '../../../shared/events';
import { padTracks } from '../../../shared/program';
import type { SpotifyArtist, SpotifyClient, SpotifyTrack } from './spotifyApi';

export type CatalogApi = Pick<SpotifyClient, 'searchArtists' | 'fetchArtistTopTracks'>;

// ─── Helpers: map raw Spotify objects to our shapes ───

export function mapArtist(a: SpotifyArtist): ArtistData {
    return {
        id: a.id,
        name: a.name,
        imageUrl: a.images[0]?.url ?? null,
    };
}

export function mapTrack(t: SpotifyTrack): TrackData {
    return {
        uri: t.uri,
        name: t.name,
        durationMs: t.duration_ms,
        artistName: t.artists[0]?.name ?? 'Unknown',
        albumImageUrl: t.album?.images[0]?.url ?? null,
    };
}

/**
 * Spotify implementation of the MusicCatalog interface.
 * Top tracks are fetched for a single market; tracks not playable there never show up.
 */
export class SpotifyProvider implements MusicCatalog {
    constructor(private client: CatalogApi, private market: string) { }

    async searchArtists(query: string, limit = 10): Promise<ArtistData[]> {
        const artists = await this.client.searchArtists(query, limit);
        return artists.map(mapArtist);
    }

    async getTopTrackSlots(artistId: string): Promise<TrackSlot[]> {
        const tracks = await this.client.fetchArtistTopTracks(artistId, this.market);
        return padTracks(tracks.map(mapTrack));
    }
}
