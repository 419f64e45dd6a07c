import { describe, it, expect } from 'vitest';
import { extractStreamUrl, parseStreamEnd, parseWebcastEvent } from '../src/tiktok/events.js';

describe('parseWebcastEvent', () => {
  it('normalizes a chat payload', () => {
    expect(parseWebcastEvent('chat', {
      uniqueId: 'fan1',
      nickname: 'Fan One',
      comment: 'hello',
      followInfo: { followerCount: 42, followingCount: 3 },
    })).toEqual({
      type: 'chat',
      user: { userId: 'fan1', nickname: 'Fan One', followerCount: 42 },
      comment: 'hello',
    });
  });

  it('marks a running combo gift as streaking', () => {
    const running = parseWebcastEvent('gift', { uniqueId: 'fan1', giftName: 'Rose', repeatCount: 3, giftType: 1, repeatEnd: false });
    const ended = parseWebcastEvent('gift', { uniqueId: 'fan1', giftName: 'Rose', repeatCount: 5, giftType: 1, repeatEnd: true });
    const single = parseWebcastEvent('gift', { uniqueId: 'fan1', giftName: 'Lion', giftType: 2 });

    expect(running).toMatchObject({ type: 'gift', repeatCount: 3, streakable: true, streaking: true });
    expect(ended).toMatchObject({ streakable: true, streaking: false });
    expect(single).toMatchObject({ giftName: 'Lion', repeatCount: 1, streakable: false, streaking: false });
  });

  it('maps member events to joins', () => {
    expect(parseWebcastEvent('member', { uniqueId: 'fan2', actionId: 1, clientEnterSource: 'feed' })).toMatchObject({
      type: 'join',
      user: { userId: 'fan2', nickname: '', followerCount: 0 },
      action: 1,
      clientEnterSource: 'feed',
    });
  });

  it('fills missing and mistyped fields with empty values', () => {
    expect(parseWebcastEvent('like', { likeCount: 'lots', followInfo: null })).toEqual({
      type: 'like',
      user: { userId: '', nickname: '', followerCount: 0 },
      likeCount: 0,
      totalLikeCount: 0,
    });
    expect(parseWebcastEvent('share', { shareCount: '7' })).toMatchObject({ shareCount: 7, shareTarget: 'unknown' });
  });

  it('returns null for a payload that is not an object', () => {
    expect(parseWebcastEvent('chat', 'nope')).toBeNull();
    expect(parseWebcastEvent('follow', null)).toBeNull();
  });
});

describe('parseStreamEnd', () => {
  it('keeps the end action code', () => {
    expect(parseStreamEnd({ action: 3 })).toEqual({ type: 'streamEnd', action: 3 });
    expect(parseStreamEnd(undefined)).toEqual({ type: 'streamEnd', action: 0 });
  });
});

describe('extractStreamUrl', () => {
  it('prefers the rtmp pull URL', () => {
    expect(extractStreamUrl({
      stream_url: { rtmp_pull_url: 'rtmp://pull/a', flv_pull_url: { HD1: 'https://pull/a.flv' } },
    })).toBe('rtmp://pull/a');
  });

  it('picks the best flv quality next', () => {
    expect(extractStreamUrl({
      stream_url: { flv_pull_url: { SD1: 'https://pull/sd.flv', HD1: 'https://pull/hd.flv' } },
    })).toBe('https://pull/hd.flv');
    expect(extractStreamUrl({
      stream_url: { flv_pull_url: { ORIGIN: 'https://pull/origin.flv' } },
    })).toBe('https://pull/origin.flv');
  });

  it('falls back to hls and then to null', () => {
    expect(extractStreamUrl({ stream_url: { hls_pull_url: 'https://pull/a.m3u8' } })).toBe('https://pull/a.m3u8');
    expect(extractStreamUrl({ stream_url: {} })).toBeNull();
    expect(extractStreamUrl({ title: 'no stream' })).toBeNull();
    expect(extractStreamUrl(undefined)).toBeNull();
  });
});
