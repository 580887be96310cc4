import type { ArtistData, TrackSlot } from '../../shared/events';

/**
 * Provider-agnostic interface for the music service the game draws from.
 * Implement this to source programs from something other than Spotify.
 */
export interface MusicCatalog {
    /** Search the provider's artist database */
    searchArtists(query: string, limit?: number): Promise<ArtistData[]>;

    /** An artist's top tracks by popularity, padded with null to exactly ten slots */
    getTopTrackSlots(artistId: string): Promise<TrackSlot[]>;
}

export interface SpotifyDeviceInfo {
    id: string;
    name: string;
    type: string;
    isActive: boolean;
}

/** Device listing, as exposed by the HTTP API. */
export interface DeviceDirectory {
    listDevices(retries?: number): Promise<SpotifyDeviceInfo[]>;
}
