import { resolve } from 'node:path';
import type { Env, SettingsOverrides } from '../config.js';
import { StatusFile } from '../control/StatusFile.js';
import { ControlSignals } from '../control/ControlSignals.js';
import { DisconnectConfirmer } from '../live/DisconnectConfirmer.js';
import { LivenessProber } from '../live/LivenessProber.js';
import { PollEngine } from '../live/PollEngine.js';
import { StabilityTracker } from '../live/StabilityTracker.js';
import { openCsvSink } from '../recording/CsvSink.js';
import { FfmpegCapture } from '../recording/FfmpegCapture.js';
import { RecordingOrchestrator } from '../recording/RecordingOrchestrator.js';
import { CsvSessionLog } from '../recording/SessionLog.js';
import { ConfigWatcher } from '../roster/ConfigWatcher.js';
import { resolveCredentials } from '../roster/rosterFile.js';
import { TikTokApiClient } from '../tiktok/TikTokApiClient.js';
import { TikTokLiveClient } from '../tiktok/TikTokLiveClient.js';
import type { LiveClientFactory, LiveStatusSource } from '../tiktok/types.js';
import type { CaptureFactory } from '../recording/types.js';
import { StreamMonitor } from './StreamMonitor.js';

const PROBE_BACKOFF_MS = 1000;
export const STATUS_FILE = 'monitor_status.json';

export interface MonitorOptions {
  configPath: string;
  overrides: SettingsOverrides;
  env: Pick<Env, 'FFMPEG_PATH'>;
  controlDirectory: string;
  /** Replaceable collaborators, mostly for tests. */
  statusSource?: LiveStatusSource;
  clientFactory?: LiveClientFactory;
  captureFactory?: CaptureFactory;
}

export interface MonitorContext {
  monitor: StreamMonitor;
  watcher: ConfigWatcher;
  orchestrator: RecordingOrchestrator;
  tracker: StabilityTracker;
  confirmer: DisconnectConfirmer;
}

/**
 * Load the roster and wire every component around one StreamMonitor.
 * Settings are read through the watcher on each use, so a reload takes
 * effect without rebuilding anything.
 */
export async function createMonitor(options: MonitorOptions): Promise<MonitorContext> {
  const watcher = new ConfigWatcher(options.configPath, options.overrides);
  const initial = await watcher.load();
  const settings = () => watcher.current().settings;

  const prober = new LivenessProber(options.statusSource ?? new TikTokApiClient(), () => ({
    timeoutMs: settings().probeTimeoutSeconds * 1000,
    retries: settings().probeRetries,
    backoffMs: PROBE_BACKOFF_MS,
  }));
  const engine = new PollEngine(prober, () => settings().pollDeadlineSeconds * 1000);

  const tracker = new StabilityTracker({
    threshold: initial.settings.stabilityThreshold,
    cooldownMs: initial.settings.cooldownSeconds * 1000,
    windowMs: initial.settings.stabilityWindowSeconds * 1000,
  });

  const ffmpegPath = options.env.FFMPEG_PATH;
  const orchestrator = new RecordingOrchestrator({
    settings,
    clientFactory: options.clientFactory ?? ((username, credentials) => new TikTokLiveClient(username, credentials)),
    captureFactory: options.captureFactory ?? ((filePath) => new FfmpegCapture(filePath, ffmpegPath)),
    openSink: openCsvSink,
    sessionLog: new CsvSessionLog(() => settings().outputDirectory),
  });

  const confirmer = new DisconnectConfirmer({
    graceMs: () => settings().disconnectGraceSeconds * 1000,
    probe: async (key) => {
      const entry = watcher.current().streamers.get(key) ?? orchestrator.getSession(key)?.entry;
      if (!entry) return false;
      return prober.isLive({ key, username: entry.username, credentials: resolveCredentials(entry, settings()) });
    },
    isActive: (key) => orchestrator.isRecording(key),
    reconnect: (key) => orchestrator.reconnect(key),
    stop: (key, reason) => orchestrator.stop(key, reason),
  });

  const controlDir = resolve(options.controlDirectory);
  const monitor = new StreamMonitor({
    watcher,
    engine,
    tracker,
    orchestrator,
    confirmer,
    control: new ControlSignals(() => controlDir),
    statusFile: new StatusFile(resolve(controlDir, STATUS_FILE)),
  });

  return { monitor, watcher, orchestrator, tracker, confirmer };
}
