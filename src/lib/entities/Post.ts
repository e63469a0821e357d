import { z } from 'zod';

const BasePostSchema = z.object({
  // Post number, unique within a board
  no: z.number().int().positive(),
  // Thread the post replies to; 0 for a topic
  resto: z.number().int().nonnegative().optional(),
  time: z.number().optional(),
  now: z.string().optional(),
  name: z.string().optional(),
  trip: z.string().optional(),
  sub: z.string().optional(),
  // Comment HTML
  com: z.string().optional(),
  filename: z.string().optional(),
  ext: z.string().optional(),
  tim: z.number().optional(),
  fsize: z.number().optional(),
  md5: z.string().optional(),
  w: z.number().optional(),
  h: z.number().optional(),
  sticky: z.number().optional(),
  closed: z.number().optional(),
  archived: z.number().optional(),
  replies: z.number().optional(),
  images: z.number().optional(),
  last_modified: z.number().optional()
});

export const PostSchema = BasePostSchema.extend({
  // Present on catalog topics only
  last_replies: z.array(BasePostSchema).optional()
});
export type Post = z.infer<typeof PostSchema>;

/**
 * Full thread as served by `/<board>/thread/<no>.json`. The first post is the
 * topic.
 */
export const ThreadDataSchema = z.object({
  posts: z.array(PostSchema).min(1)
});
export type ThreadData = z.infer<typeof ThreadDataSchema>;

export const BoardListSchema = z.object({
  boards: z.array(z.object({
    board: z.string(),
    title: z.string().optional()
  }))
});

export function isPostMatch(post: Post, regex: RegExp) {
  return [ post.name, post.com, post.sub, post.filename ]
    .some((field) => regex.test(field ?? ''));
}
