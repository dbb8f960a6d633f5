import { z } from 'zod';

export const spotifyTokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string(),
    expires_in: z.number(),
});

export type SpotifyTokenResponse = z.infer<typeof spotifyTokenResponseSchema>;

const spotifyArtistSchema = z.object({
    name: z.string(),
});

// Playlist items can hold tracks, podcast episodes, or nothing (removed
// from the catalogue); local files carry a null id
const spotifyPlaylistTrackSchema = z.object({
    id: z.string().nullable(),
    name: z.string(),
    type: z.string(),
    is_local: z.boolean().optional(),
    artists: z.array(spotifyArtistSchema).default([]),
    album: z.object({ name: z.string() }).nullish(),
});

export const spotifyPlaylistItemSchema = z.object({
    track: spotifyPlaylistTrackSchema.nullable(),
});

export const spotifyPlaylistTracksPageSchema = z.object({
    items: z.array(spotifyPlaylistItemSchema),
    total: z.number(),
    next: z.string().nullable(),
    offset: z.number(),
    limit: z.number(),
});

export type SpotifyPlaylistItem = z.infer<typeof spotifyPlaylistItemSchema>;
export type SpotifyPlaylistTracksPage = z.infer<typeof spotifyPlaylistTracksPageSchema>;
