import TikTokLiveConnector from 'tiktok-live-connector';
import { EventEmitter } from 'node:events';
import { logger } from '../logger.js';
import type { Credentials } from '../roster/types.js';
import { errorMessage } from '../utils/errors.js';
import {
  WEBCAST_DATA_EVENTS,
  extractStreamUrl,
  parseConnectionState,
  parseStreamEnd,
  parseWebcastEvent,
} from './events.js';
import type { ConnectInfo, LiveClient, LiveEvent } from './types.js';

const { WebcastPushConnection } = TikTokLiveConnector;
type WebcastConnection = InstanceType<typeof WebcastPushConnection>;
export type WebcastOptions = NonNullable<ConstructorParameters<typeof WebcastPushConnection>[1]>;

export function webcastOptions(credentials: Credentials): WebcastOptions {
  const options: WebcastOptions = {
    processInitialData: false,
    enableExtendedGiftInfo: false,
    enableWebsocketUpgrade: true,
    fetchRoomInfoOnConnect: true,
    // Session cookie unlocks age-restricted rooms; it is bound to a data center
    ...(credentials.sessionId ? { sessionId: credentials.sessionId } : {}),
    ...(credentials.sessionId && credentials.targetIdc
      ? { requestHeaders: { Cookie: `tt-target-idc=${credentials.targetIdc}` } }
      : {}),
  };
  return options;
}

/**
 * Wraps tiktok-live-connector's WebcastPushConnection for one broadcast.
 * Library events are normalized and re-emitted on the single 'event' channel.
 */
export class TikTokLiveClient extends EventEmitter implements LiveClient {
  private connection: WebcastConnection;
  private connected = false;

  constructor(readonly username: string, credentials: Credentials) {
    super();
    const uniqueId = username.replace(/^@/, '');
    this.connection = new WebcastPushConnection(uniqueId, webcastOptions(credentials));

    for (const name of WEBCAST_DATA_EVENTS) {
      this.connection.on(name, (data: unknown) => {
        const event = parseWebcastEvent(name, data);
        if (event) this.emitEvent(event);
      });
    }

    this.connection.on('connected', (state: unknown) => {
      this.connected = true;
      const roomId = parseConnectionState(state)?.roomId ?? '';
      logger.info(`[TikTokLive] Connected to ${this.username} (room ${roomId})`);
      this.emitEvent({ type: 'connect', roomId });
    });

    this.connection.on('disconnected', () => {
      this.connected = false;
      logger.warn(`[TikTokLive] Disconnected from ${this.username}`);
      this.emitEvent({ type: 'disconnect', reason: 'connection closed' });
    });

    this.connection.on('streamEnd', (data: unknown) => {
      logger.info(`[TikTokLive] Stream end signal for ${this.username}`);
      this.emitEvent(parseStreamEnd(data));
    });

    this.connection.on('error', (err: unknown) => {
      logger.debug(`[TikTokLive] ${this.username}: ${errorMessage(err)}`);
    });
  }

  async connect(): Promise<ConnectInfo> {
    try {
      const state = parseConnectionState(await this.connection.connect());
      if (!state) throw new Error(`Unexpected connection state for ${this.username}`);
      this.connected = true;
      return { roomId: state.roomId, streamUrl: extractStreamUrl(state.roomInfo) };
    } catch (err) {
      logger.error(`[TikTokLive] Failed to connect to ${this.username}: ${errorMessage(err)}`);
      throw err;
    }
  }

  async reconnect(): Promise<void> {
    if (this.connected) return;
    logger.info(`[TikTokLive] Reconnecting to ${this.username}`);
    await this.connect();
  }

  async disconnect(): Promise<void> {
    try {
      this.connection.disconnect();
    } catch (err) {
      // already closed sockets throw here; nothing left to release
      logger.debug(`[TikTokLive] disconnect ${this.username}: ${errorMessage(err)}`);
    }
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  private emitEvent(event: LiveEvent): void {
    this.emit('event', event);
  }
}
