/**
 * Maps raw platform payloads to the flat records handed to a ContentSink.
 *
 * Every function is pure; missing fields become empty strings so that one malformed
 * payload never aborts a page.
 */

import { CONTENT_URL_PREFIX } from '../config/constants';
import { isJsonRecord } from '../utils/safe-json';

export interface ContentRecord {
  contentId: string;
  contentType: string;
  title: string;
  desc: string;
  createTime: string;
  likedCount: string;
  commentCount: string;
  shareCount: string;
  collectedCount: string;
  url: string;
  coverUrl: string;
  videoUrl: string;
  sourceKeyword: string;
  isAiGenerated: boolean;
  userId: string;
  secUid: string;
  shortUserId: string;
  uniqueId: string;
  nickname: string;
  avatar: string;
  signature: string;
  ipLocation: string;
}

export interface CommentRecord {
  commentId: string;
  contentId: string;
  text: string;
  createTime: string;
  subCommentCount: string;
  parentCommentId: string;
  replyToReplyId: string;
  likeCount: string;
  pictures: string;
  ipLocation: string;
  userId: string;
  secUid: string;
  shortUserId: string;
  uniqueId: string;
  nickname: string;
  avatar: string;
  signature: string;
}

export interface CreatorRecord {
  userId: string;
  secUid: string;
  nickname: string;
  avatar: string;
  ipLocation: string;
  desc: string;
  gender: 'unknown' | 'male' | 'female';
  follows: string;
  fans: string;
  interaction: string;
  videosCount: string;
}

type Raw = Record<string, unknown>;

function record(value: unknown): Raw {
  return isJsonRecord(value) ? value : {};
}

function text(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return '';
}

function urlList(value: unknown): string[] {
  const list = record(value).url_list;
  return Array.isArray(list) ? list.filter((entry): entry is string => typeof entry === 'string') : [];
}

function firstUrl(value: unknown): string {
  return urlList(value)[0] ?? '';
}

/** The last entry of the first non-empty play address list; lists of one are placeholders. */
function videoUrlOf(item: Raw): string {
  const video = record(item.video);
  const candidates = [video.play_addr_h264, video.play_addr_256, video.play_addr].map(urlList);
  const list = candidates.find((entry) => entry.length > 0) ?? [];
  return list.length < 2 ? '' : list[list.length - 1];
}

function coverUrlOf(item: Raw): string {
  const video = record(item.video);
  const raw = isJsonRecord(video.raw_cover) && Object.keys(video.raw_cover).length > 0 ? video.raw_cover : video.origin_cover;
  const list = urlList(raw);
  return list.length > 1 ? list[1] : '';
}

/**
 * Search results wrap the item in `aweme_info`; mixes carry it as their first entry.
 * Returns null when the entry holds no item.
 */
export function unwrapSearchEntry(entry: Raw): Raw | null {
  if (isJsonRecord(entry.aweme_info)) return entry.aweme_info;
  const mixItems = record(entry.aweme_mix_info).mix_items;
  if (Array.isArray(mixItems) && isJsonRecord(mixItems[0])) return mixItems[0];
  return null;
}

export function contentIdOf(item: Raw): string {
  return text(item.aweme_id);
}

export function extractContent(raw: Raw, sourceKeyword: string = ''): ContentRecord {
  const item = isJsonRecord(raw.aweme_info) ? raw.aweme_info : raw;
  const statistics = record(item.statistics);
  const author = record(item.author);
  const contentId = text(item.aweme_id);
  const desc = text(item.desc);

  return {
    contentId,
    contentType: text(item.aweme_type),
    title: text(item.preview_title) || desc,
    desc,
    createTime: text(item.create_time),
    likedCount: text(statistics.digg_count),
    commentCount: text(statistics.comment_count),
    shareCount: text(statistics.share_count),
    collectedCount: text(statistics.collect_count),
    url: `${CONTENT_URL_PREFIX}${contentId}`,
    coverUrl: coverUrlOf(item),
    videoUrl: videoUrlOf(item),
    sourceKeyword,
    isAiGenerated: Number(record(item.aigc_info).aigc_label_type ?? 0) > 0,
    userId: text(author.uid),
    secUid: text(author.sec_uid),
    shortUserId: text(author.short_id),
    uniqueId: text(author.unique_id),
    nickname: text(author.nickname),
    avatar: firstUrl(author.avatar_thumb),
    signature: text(author.signature),
    ipLocation: text(item.ip_label),
  };
}

function pictureUrls(comment: Raw): string {
  const images = comment.image_list;
  if (!Array.isArray(images)) return '';
  return images
    .map((image) => urlList(record(image).origin_url))
    .filter((list) => list.length > 1)
    .map((list) => list[1])
    .join(',');
}

export function extractComment(contentId: string, raw: Raw): CommentRecord {
  const user = record(raw.user);
  return {
    commentId: text(raw.cid),
    contentId,
    text: text(raw.text),
    createTime: text(raw.create_time),
    subCommentCount: text(raw.reply_comment_total),
    parentCommentId: text(raw.reply_id),
    replyToReplyId: text(raw.reply_to_reply_id),
    likeCount: text(raw.digg_count),
    pictures: pictureUrls(raw),
    ipLocation: text(raw.ip_label),
    userId: text(user.uid),
    secUid: text(user.sec_uid),
    shortUserId: text(user.short_id),
    uniqueId: text(user.unique_id),
    nickname: text(user.nickname),
    avatar: firstUrl(user.avatar_thumb),
    signature: text(user.signature),
  };
}

const GENDERS: Record<number, CreatorRecord['gender']> = { 1: 'male', 2: 'female' };

export function extractCreator(raw: Raw): CreatorRecord {
  const user = isJsonRecord(raw.user) ? raw.user : raw;
  const statistics = record(user.statistics);
  const gender = typeof user.gender === 'number' ? GENDERS[user.gender] : undefined;

  return {
    userId: text(user.uid),
    secUid: text(user.sec_uid),
    nickname: text(user.nickname),
    avatar: firstUrl(user.avatar_larger),
    ipLocation: text(user.ip_location),
    desc: text(user.signature),
    gender: gender ?? 'unknown',
    follows: text(user.following_count ?? statistics.following_count),
    fans: text(user.follower_count ?? statistics.follower_count),
    interaction: text(user.total_favorited ?? statistics.total_favorited),
    videosCount: text(user.aweme_count ?? statistics.aweme_count),
  };
}

/** Number of replies a comment reports, 0 when absent. */
export function replyCountOf(raw: Raw): number {
  const count = Number(raw.reply_comment_total ?? 0);
  return Number.isFinite(count) ? count : 0;
}
