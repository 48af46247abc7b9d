/**
 * Shared type definitions
 */

export * from './config';
export * from './app';

export type TaskStatus = 'queued' | 'running' | 'completed' | 'failed';

export type Credentials =
  | { anonymous: true }
  | {
      anonymous: false;
      username: string;
      password: string;
      guardCode?: string;
    };

export const ANONYMOUS: Credentials = { anonymous: true };

/**
 * Everything needed to fetch and archive one piece of content
 */
export interface DownloadRequest {
  /** Store URL or bare numeric content identifier */
  source: string;
  outputPath: string;
  resume: boolean;
  credentials: Credentials;
}

/**
 * Queue entry. Credentials live in memory only; see TaskRecord for what is persisted.
 */
export interface DownloadTask extends DownloadRequest {
  id: string;
  createdAt: Date;
  status: TaskStatus;
}

/**
 * On-disk form of a task. Never carries credential fields.
 */
export interface TaskRecord {
  id: string;
  source: string;
  outputPath: string;
  resume: boolean;
  createdAt: string; // ISO Date
  status: TaskStatus;
}

export interface ProgressSample {
  percent: number;
  bytesDone?: number;
  bytesTotal?: number;
}

export interface SessionResult {
  log: string[];
  error?: string;
}

export type CheckStatus = 'found' | 'not-found' | 'fixed' | 'unfixable';

export interface CheckItem {
  name: string;
  status: CheckStatus;
  detail: string;
}

export interface EnvironmentReport {
  freeBytes?: number;
  items: CheckItem[];
}
