import { z } from 'zod';

export const googleTokenResponseSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number(),
    token_type: z.string().optional(),
});

export const youtubeErrorBodySchema = z.object({
    error: z.object({
        code: z.number().optional(),
        message: z.string().optional(),
        status: z.string().optional(),
        errors: z
            .array(z.object({ reason: z.string().optional(), message: z.string().optional() }))
            .optional(),
    }),
});

export type YouTubeErrorBody = z.infer<typeof youtubeErrorBodySchema>;

export const youtubeSearchResponseSchema = z.object({
    items: z
        .array(
            z.object({
                id: z.object({ videoId: z.string().optional() }),
                snippet: z
                    .object({
                        title: z.string().default(''),
                        channelTitle: z.string().default(''),
                    })
                    .optional(),
            })
        )
        .default([]),
});

export type YouTubeSearchResponse = z.infer<typeof youtubeSearchResponseSchema>;

export const youtubePlaylistItemSchema = z.object({
    id: z.string(),
    snippet: z
        .object({
            title: z.string().default(''),
            videoOwnerChannelTitle: z.string().optional(),
            position: z.number().default(0),
        })
        .optional(),
    contentDetails: z
        .object({
            videoId: z.string().optional(),
        })
        .optional(),
});

export const youtubePlaylistItemsResponseSchema = z.object({
    items: z.array(youtubePlaylistItemSchema).default([]),
    nextPageToken: z.string().optional(),
});

export type YouTubePlaylistItem = z.infer<typeof youtubePlaylistItemSchema>;
export type YouTubePlaylistItemsResponse = z.infer<typeof youtubePlaylistItemsResponseSchema>;
