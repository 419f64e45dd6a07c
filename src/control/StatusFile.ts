import { rename, writeFile } from 'node:fs/promises';

export type MonitorState = 'starting' | 'running' | 'paused' | 'stopping' | 'stopped';

export interface MonitorStatus {
  timestamp: string;
  state: MonitorState;
  activeRecordings: number;
  recordingUsernames: string[];
  /** Recording sessions whose video capture died; their events are still written. */
  captureLost: string[];
  pendingDisconnects: number;
  pid: number;
  pausedUntil: string | null;
  cycle: number;
}

/** Overwritten each cycle; written to a temp file first so readers never see half a document. */
export class StatusFile {
  constructor(readonly path: string) {}

  async write(status: MonitorStatus): Promise<void> {
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(status, null, 2) + '\n', 'utf-8');
    await rename(tmp, this.path);
  }
}
