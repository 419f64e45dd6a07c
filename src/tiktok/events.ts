import { z } from 'zod';
import type { DataEvent, LiveUser, StreamEndEvent } from './types.js';

// Webcast payloads are loosely shaped and fields come and go between
// releases, so every field falls back to an empty value instead of failing.

const num = z.coerce.number().catch(0);
const str = z.coerce.string().catch('');
const bool = z.boolean().catch(false);

const userSchema = z.object({
  uniqueId: str.default(''),
  nickname: str.default(''),
  followInfo: z.object({ followerCount: num.default(0) }).catch({ followerCount: 0 }).default({ followerCount: 0 }),
});

const chatSchema = userSchema.extend({ comment: str.default('') });

const giftSchema = userSchema.extend({
  giftName: str.default(''),
  repeatCount: num.default(1),
  repeatEnd: bool.default(false),
  // 1 = streakable combo gift
  giftType: num.default(0),
});

const socialSchema = userSchema.extend({
  followCount: num.default(0),
  shareType: num.default(0),
  shareTarget: str.default('unknown'),
  shareCount: num.default(0),
  usersJoined: num.default(0),
  actionId: num.default(0),
});

const memberSchema = userSchema.extend({
  count: num.default(0),
  isTopUser: bool.default(false),
  enterType: num.default(0),
  actionId: num.default(0),
  userShareType: str.default(''),
  clientEnterSource: str.default(''),
});

const likeSchema = userSchema.extend({
  likeCount: num.default(0),
  totalLikeCount: num.default(0),
});

const streamEndSchema = z.object({ action: num.default(0) });

/** Library event names carrying captured data, mapped to our event types. */
export const WEBCAST_DATA_EVENTS = ['chat', 'gift', 'follow', 'share', 'member', 'like'] as const;
export type WebcastDataEventName = (typeof WEBCAST_DATA_EVENTS)[number];

function toUser(data: z.infer<typeof userSchema>): LiveUser {
  return {
    userId: data.uniqueId,
    nickname: data.nickname,
    followerCount: data.followInfo.followerCount,
  };
}

/** Normalize one raw webcast payload. Returns null when it is not an object. */
export function parseWebcastEvent(name: WebcastDataEventName, raw: unknown): DataEvent | null {
  if (typeof raw !== 'object' || raw === null) return null;

  switch (name) {
    case 'chat': {
      const d = chatSchema.parse(raw);
      return { type: 'chat', user: toUser(d), comment: d.comment };
    }
    case 'gift': {
      const d = giftSchema.parse(raw);
      const streakable = d.giftType === 1;
      return {
        type: 'gift',
        user: toUser(d),
        giftName: d.giftName,
        repeatCount: d.repeatCount,
        streakable,
        streaking: streakable && !d.repeatEnd,
      };
    }
    case 'follow': {
      const d = socialSchema.parse(raw);
      return {
        type: 'follow',
        user: toUser(d),
        followCount: d.followCount,
        shareType: d.shareType,
        action: d.actionId,
      };
    }
    case 'share': {
      const d = socialSchema.parse(raw);
      return {
        type: 'share',
        user: toUser(d),
        shareType: d.shareType,
        shareTarget: d.shareTarget,
        shareCount: d.shareCount,
        usersJoined: d.usersJoined,
        action: d.actionId,
      };
    }
    case 'member': {
      const d = memberSchema.parse(raw);
      return {
        type: 'join',
        user: toUser(d),
        count: d.count,
        isTopUser: d.isTopUser,
        enterType: d.enterType,
        action: d.actionId,
        userShareType: d.userShareType,
        clientEnterSource: d.clientEnterSource,
      };
    }
    case 'like': {
      const d = likeSchema.parse(raw);
      return { type: 'like', user: toUser(d), likeCount: d.likeCount, totalLikeCount: d.totalLikeCount };
    }
  }
}

export function parseStreamEnd(raw: unknown): StreamEndEvent {
  const d = streamEndSchema.safeParse(raw ?? {});
  return { type: 'streamEnd', action: d.success ? d.data.action : 0 };
}

const connectionStateSchema = z.object({
  roomId: z.union([z.string(), z.number()]).transform(String),
  roomInfo: z.unknown(),
});

export interface ConnectionState {
  roomId: string;
  roomInfo: unknown;
}

/** The state object the connector hands back on connect. Null when it has no room id. */
export function parseConnectionState(raw: unknown): ConnectionState | null {
  const parsed = connectionStateSchema.safeParse(raw);
  if (!parsed.success) return null;
  return { roomId: parsed.data.roomId, roomInfo: parsed.data.roomInfo };
}

const roomInfoSchema = z.object({
  stream_url: z.object({
    rtmp_pull_url: z.string().optional(),
    flv_pull_url: z.record(z.string(), z.string()).optional(),
    hls_pull_url: z.string().optional(),
  }).optional(),
}).passthrough();

// Highest quality first
const FLV_QUALITY_ORDER = ['FULL_HD1', 'HD1', 'SD1', 'SD2'];

/** Pick a pull URL from room info: rtmp, then the best flv, then hls. */
export function extractStreamUrl(roomInfo: unknown): string | null {
  const parsed = roomInfoSchema.safeParse(roomInfo);
  if (!parsed.success || !parsed.data.stream_url) return null;
  const urls = parsed.data.stream_url;
  if (urls.rtmp_pull_url) return urls.rtmp_pull_url;
  if (urls.flv_pull_url) {
    for (const quality of FLV_QUALITY_ORDER) {
      const url = urls.flv_pull_url[quality];
      if (url) return url;
    }
    const first = Object.values(urls.flv_pull_url).find((u) => u.length > 0);
    if (first) return first;
  }
  return urls.hls_pull_url || null;
}
