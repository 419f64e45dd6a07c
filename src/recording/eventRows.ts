import type { DataEvent } from '../tiktok/types.js';
import type { CsvValue } from '../utils/csv.js';
import type { EventKind } from './types.js';

export const EVENT_HEADERS: Record<EventKind, readonly string[]> = {
  comments: ['timestamp', 'user_id', 'nickname', 'comment', 'follower_count'],
  gifts: ['timestamp', 'user_id', 'nickname', 'gift_name', 'repeat_count', 'streakable', 'streaking'],
  follows: ['timestamp', 'user_id', 'nickname', 'follow_count', 'share_type', 'action'],
  shares: ['timestamp', 'user_id', 'nickname', 'share_type', 'share_target', 'share_count', 'users_joined', 'action'],
  joins: [
    'timestamp', 'user_id', 'nickname', 'count', 'is_top_user', 'enter_type', 'action',
    'user_share_type', 'client_enter_source',
  ],
  likes: ['timestamp', 'user_id', 'nickname', 'like_count', 'total_like_count'],
};

export interface EventRecord {
  kind: EventKind;
  row: CsvValue[];
}

/** The one routing point from a protocol data event to its sink and row. */
export function toEventRecord(event: DataEvent, at: Date): EventRecord {
  const ts = at.toISOString();
  const { userId, nickname } = event.user;

  switch (event.type) {
    case 'chat':
      return { kind: 'comments', row: [ts, userId, nickname, event.comment, event.user.followerCount] };
    case 'gift':
      return {
        kind: 'gifts',
        row: [ts, userId, nickname, event.giftName, event.repeatCount, event.streakable, event.streaking],
      };
    case 'follow':
      return { kind: 'follows', row: [ts, userId, nickname, event.followCount, event.shareType, event.action] };
    case 'share':
      return {
        kind: 'shares',
        row: [ts, userId, nickname, event.shareType, event.shareTarget, event.shareCount, event.usersJoined, event.action],
      };
    case 'join':
      return {
        kind: 'joins',
        row: [
          ts, userId, nickname, event.count, event.isTopUser, event.enterType, event.action,
          event.userShareType, event.clientEnterSource,
        ],
      };
    case 'like':
      return { kind: 'likes', row: [ts, userId, nickname, event.likeCount, event.totalLikeCount] };
  }
}
