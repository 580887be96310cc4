// ─── Program Builder ───
// Ten artists × ten track ranks. Round n plays artist (n-1) mod 10, rank (n-1) div 10,
// so every artist gets one track before any artist gets its second.

import { InvalidInputError } from './errors';
import { PROGRAM_SIZE, type ArtistData, type RoundSlot, type TrackData, type TrackSlot } from './events';

export interface Program {
    readonly artists: readonly ArtistData[];
    readonly slots: readonly (readonly TrackSlot[])[];
}

export function buildProgram(artists: readonly ArtistData[], tracksByArtist: readonly (readonly TrackSlot[])[]): Program {
    if (artists.length !== PROGRAM_SIZE) {
        throw new InvalidInputError(`Exactly ${PROGRAM_SIZE} artists are required, got ${artists.length}`);
    }
    if (tracksByArtist.length !== PROGRAM_SIZE) {
        throw new InvalidInputError(`Expected track lists for ${PROGRAM_SIZE} artists, got ${tracksByArtist.length}`);
    }

    const seen = new Set<string>();
    for (const artist of artists) {
        if (seen.has(artist.id)) {
            throw new InvalidInputError(`Artist selected twice: ${artist.name}`);
        }
        seen.add(artist.id);
    }

    const slots = tracksByArtist.map((tracks, artistIndex) => {
        if (tracks.length !== PROGRAM_SIZE) {
            throw new InvalidInputError(
                `Artist ${artistIndex} has ${tracks.length} track slots; pad to ${PROGRAM_SIZE} with null`
            );
        }
        return Object.freeze(
            tracks.map((track, rank) => {
                if (track === null) return null;
                if (!Number.isInteger(track.durationMs) || track.durationMs < 0) {
                    throw new InvalidInputError(
                        `Track at artist ${artistIndex}, rank ${rank} has an invalid duration: ${track.durationMs}`
                    );
                }
                return Object.freeze({ ...track });
            })
        );
    });

    return Object.freeze({
        artists: Object.freeze(artists.map((a) => Object.freeze({ ...a }))),
        slots: Object.freeze(slots),
    });
}

export function slotForRound(round: number): RoundSlot {
    if (!Number.isInteger(round) || round < 1) {
        throw new InvalidInputError(`Round must be a positive integer, got ${round}`);
    }
    return {
        artistIndex: (round - 1) % PROGRAM_SIZE,
        trackRank: Math.floor((round - 1) / PROGRAM_SIZE),
    };
}

/** Track at a slot, or null for an absent slot or a rank past the grid (rounds over 100). */
export function trackAt(program: Program, slot: RoundSlot): TrackData | null {
    return program.slots[slot.artistIndex]?.[slot.trackRank] ?? null;
}

/** Keep the first ten tracks and fill the rest with absent slots. */
export function padTracks(tracks: readonly TrackData[]): TrackSlot[] {
    const padded: TrackSlot[] = tracks.slice(0, PROGRAM_SIZE);
    while (padded.length < PROGRAM_SIZE) {
        padded.push(null);
    }
    return padded;
}
