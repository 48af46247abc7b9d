export interface ToolConfig {
  /** Preferred executable path or bare command name */
  path: string;
  /** Extra locations probed by the environment check */
  candidates: string[];
  /** Shell command used to reinstall the tool when it cannot be found */
  installCommand?: string;
}

export interface SessionConfig {
  workRoot: string;
  loginTimeoutMs: number;
  sizeTimeoutMs: number;
  loginAttempts: number;
  loginRetryDelayMs: number;
  loginSettleDelayMs: number;
  archiveFormat: string;
  /** Volume size passed to the archiver (e.g. "4g"); undefined writes a single file */
  volumeSize?: string;
  minFreeBytes: number;
  validateDownload: boolean;
  estimateSize: boolean;
}

export interface AppConfig {
  port: number;
  debug: boolean;
  logLevel: string;
  tunnelAuthToken?: string;
  client: ToolConfig;
  archiver: ToolConfig;
  tunnelBinary: string;
  outputDir: string;
  queueDir: string;
  logsDir: string;
  processGraceMs: number;
  session: SessionConfig;
}
