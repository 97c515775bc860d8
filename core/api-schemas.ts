/**
 * Response shapes of the typed operations. Only the fields the crawler reads are declared;
 * everything else passes through untouched for the extractor.
 */

import { z } from 'zod';

const rawRecord = z.record(z.unknown());

const hasMore = z.union([z.number(), z.boolean()]).transform((v) => v === true || v === 1);

const cursor = z.union([z.number(), z.string()]).transform((v) => String(v));

export const statusSchema = z
  .object({
    status_code: z.number().optional(),
    status_msg: z.string().nullish(),
  })
  .passthrough();

export const searchPageSchema = statusSchema.extend({
  data: z.array(rawRecord).nullish(),
  extra: z.object({ logid: z.string().optional() }).passthrough().nullish(),
  has_more: hasMore.optional(),
});

export const itemDetailSchema = statusSchema.extend({
  aweme_detail: rawRecord.nullish(),
});

export const commentPageSchema = statusSchema.extend({
  comments: z.array(rawRecord).nullish(),
  cursor: cursor.optional(),
  has_more: hasMore.optional(),
  total: z.number().optional(),
});

export const profileSchema = statusSchema.extend({
  user: rawRecord.nullish(),
});

export const userPostPageSchema = statusSchema.extend({
  aweme_list: z.array(rawRecord).nullish(),
  max_cursor: cursor.optional(),
  has_more: hasMore.optional(),
});

export const feedPageSchema = z
  .object({
    StatusCode: z.number().optional(),
    StatusMessage: z.string().nullish(),
    cards: z
      .array(
        z
          .object({
            type: z.number().optional(),
            aweme: z.string().optional(),
          })
          .passthrough(),
      )
      .nullish(),
  })
  .passthrough();

export type RawRecord = z.infer<typeof rawRecord>;
export type StatusResponse = z.infer<typeof statusSchema>;
export type SearchPage = z.infer<typeof searchPageSchema>;
export type ItemDetail = z.infer<typeof itemDetailSchema>;
export type CommentPage = z.infer<typeof commentPageSchema>;
export type ProfileResponse = z.infer<typeof profileSchema>;
export type UserPostPage = z.infer<typeof userPostPageSchema>;
export type FeedPage = z.infer<typeof feedPageSchema>;
