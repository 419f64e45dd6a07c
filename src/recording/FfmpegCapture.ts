import { spawn, type ChildProcess } from 'node:child_process';
import { logger } from '../logger.js';
import { CaptureError } from '../utils/errors.js';
import type { MediaCapture } from './types.js';

const STARTUP_GRACE_MS = 2000;
const STOP_TIMEOUT_MS = 5000;

/** Remux the pull stream to mp4 without re-encoding; fragmented so a cut-off file still plays. */
export function buildFfmpegArgs(streamUrl: string, filePath: string): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'warning',
    '-y',
    '-i', streamUrl,
    '-c', 'copy',
    '-movflags', '+frag_keyframe+empty_moov',
    '-f', 'mp4',
    filePath,
  ];
}

export class FfmpegCapture implements MediaCapture {
  private proc: ChildProcess | null = null;
  private stopping = false;
  private lost: string | null = null;

  constructor(
    readonly filePath: string,
    private ffmpegPath = 'ffmpeg',
    private startupGraceMs = STARTUP_GRACE_MS,
  ) {}

  isCapturing(): boolean {
    return this.proc !== null;
  }

  failure(): string | null {
    return this.lost;
  }

  async start(streamUrl: string): Promise<void> {
    if (this.proc) {
      logger.warn(`Capture already running for ${this.filePath}`);
      return;
    }
    this.stopping = false;
    this.lost = null;

    const proc = spawn(this.ffmpegPath, buildFfmpegArgs(streamUrl, this.filePath), {
      stdio: ['pipe', 'ignore', 'pipe'],
      windowsHide: true,
    });
    this.proc = proc;

    proc.stderr?.on('data', (data: Buffer) => {
      const msg = data.toString().trim();
      if (msg) logger.debug(`[ffmpeg:${this.filePath}] ${msg}`);
    });

    proc.on('exit', (code, signal) => {
      if (this.proc === proc) this.proc = null;
      if (this.stopping) return;
      this.lost = code === null ? `ffmpeg killed by ${signal ?? 'unknown signal'}` : `ffmpeg exited with code ${code}`;
      logger.warn({ code, signal }, `ffmpeg exited unexpectedly for ${this.filePath}, events are still recorded`);
    });

    // Wait briefly to make sure ffmpeg did not die on a bad URL or missing binary
    await new Promise<void>((resolve, reject) => {
      const onEarlyExit = (code: number | null) => {
        cleanup();
        reject(new CaptureError(`ffmpeg exited early with code ${code}`));
      };
      const onSpawnError = (err: Error) => {
        cleanup();
        this.proc = null;
        reject(new CaptureError(`ffmpeg spawn error: ${err.message}`));
      };
      const timeout = setTimeout(() => {
        cleanup();
        resolve();
      }, this.startupGraceMs);
      const cleanup = () => {
        clearTimeout(timeout);
        proc.removeListener('exit', onEarlyExit);
        proc.removeListener('error', onSpawnError);
      };
      proc.once('exit', onEarlyExit);
      proc.once('error', onSpawnError);
    });

    logger.info(`🎥 Started video recording: ${this.filePath}`);
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;
    this.stopping = true;

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        logger.warn(`Force killing ffmpeg for ${this.filePath}`);
        proc.kill('SIGKILL');
        resolve();
      }, STOP_TIMEOUT_MS);

      proc.once('exit', () => {
        clearTimeout(timeout);
        resolve();
      });

      // 'q' lets ffmpeg flush and close the container cleanly
      if (proc.stdin && !proc.stdin.destroyed) {
        proc.stdin.on('error', () => proc.kill('SIGINT'));
        proc.stdin.end('q');
      } else {
        proc.kill('SIGINT');
      }
    });

    this.proc = null;
    logger.info(`Video recording stopped: ${this.filePath}`);
  }
}
