import type { Credentials } from '../roster/types.js';

// ─── Events yielded by a live protocol client ───

export interface LiveUser {
  userId: string;
  nickname: string;
  followerCount: number;
}

export interface ChatEvent {
  type: 'chat';
  user: LiveUser;
  comment: string;
}

export interface GiftEvent {
  type: 'gift';
  user: LiveUser;
  giftName: string;
  repeatCount: number;
  streakable: boolean;
  /** True while a streakable gift combo is still running. */
  streaking: boolean;
}

export interface FollowEvent {
  type: 'follow';
  user: LiveUser;
  followCount: number;
  shareType: number;
  action: number;
}

export interface ShareEvent {
  type: 'share';
  user: LiveUser;
  shareType: number;
  shareTarget: string;
  shareCount: number;
  usersJoined: number;
  action: number;
}

export interface JoinEvent {
  type: 'join';
  user: LiveUser;
  count: number;
  isTopUser: boolean;
  enterType: number;
  action: number;
  userShareType: string;
  clientEnterSource: string;
}

export interface LikeEvent {
  type: 'like';
  user: LiveUser;
  likeCount: number;
  totalLikeCount: number;
}

export interface ConnectEvent {
  type: 'connect';
  roomId: string;
}

/** Generic connection drop. Not proof that the broadcast is over. */
export interface DisconnectEvent {
  type: 'disconnect';
  reason: string;
}

/** Authoritative end-of-broadcast signal from the platform. */
export interface StreamEndEvent {
  type: 'streamEnd';
  action: number;
}

export type DataEvent = ChatEvent | GiftEvent | FollowEvent | ShareEvent | JoinEvent | LikeEvent;
export type ControlEvent = ConnectEvent | DisconnectEvent | StreamEndEvent;
export type LiveEvent = DataEvent | ControlEvent;

// ─── Collaborator contracts ───

export interface ConnectInfo {
  roomId: string;
  /** Pull URL for media capture, when the room exposes one. */
  streamUrl: string | null;
}

/**
 * Connection to one broadcast. Every protocol event goes out through the
 * single `'event'` channel.
 */
export interface LiveClient {
  readonly username: string;
  connect(): Promise<ConnectInfo>;
  /** Re-open a dropped connection; emits a `connect` event once it is up. */
  reconnect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  on(event: 'event', listener: (event: LiveEvent) => void): this;
  removeAllListeners(event?: 'event'): this;
}

export type LiveClientFactory = (username: string, credentials: Credentials) => LiveClient;

/** Answers "is this account on air right now". May throw; the prober absorbs it. */
export interface LiveStatusSource {
  isLive(username: string, credentials: Credentials, signal: AbortSignal): Promise<boolean>;
}
