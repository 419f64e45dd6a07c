import { z } from 'zod';
import { logger } from '../logger.js';
import type { Credentials } from '../roster/types.js';
import type { LiveStatusSource } from './types.js';

// ─── Web API response ───

const ROOM_STATUS_LIVE = 2;

const roomResponseSchema = z.object({
  statusCode: z.number().optional(),
  data: z.object({
    user: z.object({ roomId: z.string().optional() }).passthrough().optional(),
    liveRoom: z.object({ status: z.number() }).passthrough().optional(),
  }).passthrough().optional(),
}).passthrough();

export type RoomResponse = z.infer<typeof roomResponseSchema>;

/** Room status 2 is the only on-air state; anything missing counts as offline. */
export function isRoomLive(body: RoomResponse): boolean {
  return body.data?.liveRoom?.status === ROOM_STATUS_LIVE;
}

// ─── Client ───

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/**
 * Liveness lookups against the public room endpoint. Throws on transport
 * errors and malformed bodies; the prober decides what a failure means.
 */
export class TikTokApiClient implements LiveStatusSource {
  constructor(private baseUrl = 'https://www.tiktok.com') {}

  async isLive(username: string, credentials: Credentials, signal: AbortSignal): Promise<boolean> {
    const url = new URL('/api-live/user/room/', this.baseUrl);
    url.searchParams.set('aid', '1988');
    url.searchParams.set('sourceType', '54');
    url.searchParams.set('uniqueId', username.replace(/^@/, ''));

    const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
    const cookie = buildCookie(credentials);
    if (cookie) headers.Cookie = cookie;

    const res = await fetch(url.toString(), { headers, signal });
    if (!res.ok) {
      const body = await res.text();
      throw new Error(`Room lookup for ${username} failed (${res.status}): ${body.slice(0, 200)}`);
    }

    const parsed = roomResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Malformed room response for ${username}`);
    }

    const live = isRoomLive(parsed.data);
    logger.debug(`[TikTokApi] ${username} room status: ${parsed.data.data?.liveRoom?.status ?? 'none'}`);
    return live;
  }
}

export function buildCookie(credentials: Credentials): string | null {
  const parts: string[] = [];
  if (credentials.sessionId) parts.push(`sessionid=${credentials.sessionId}`);
  if (credentials.sessionId && credentials.targetIdc) parts.push(`tt-target-idc=${credentials.targetIdc}`);
  return parts.length ? parts.join('; ') : null;
}
