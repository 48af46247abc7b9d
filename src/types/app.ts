import { ProcessRegistry } from '../process/ProcessRegistry';
import { ProcessRunner } from '../process/ProcessRunner';
import { CredentialedSession } from '../session/CredentialedSession';
import { TaskQueue } from '../queue/TaskQueue';
import { TaskStore } from '../queue/TaskStore';
import { TunnelLauncher } from '../tunnel/TunnelLauncher';
import { EnvironmentChecker } from '../utils/EnvironmentChecker';
import { FileManager } from '../utils/FileManager';
import { AppConfig } from './config';

export interface AppContext {
  config: AppConfig;
  registry: ProcessRegistry;
  runner: ProcessRunner;
  fileManager: FileManager;
  environment: EnvironmentChecker;
  session: CredentialedSession;
  store: TaskStore;
  queue: TaskQueue;
  tunnel: TunnelLauncher;
}
