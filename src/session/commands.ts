import { Command } from '../process/ProcessRunner';
import { Credentials } from '../types';

/**
 * Command lines for the content client and the archiver
 */

export function buildLoginCommand(client: string, credentials: Credentials): Command {
  const args: string[] = [];
  if (credentials.anonymous) {
    args.push('+login', 'anonymous');
  } else {
    if (credentials.guardCode) {
      args.push('+set_steam_guard_code', credentials.guardCode);
    }
    args.push('+login', credentials.username, credentials.password);
  }
  args.push('+quit');
  return { executable: client, args };
}

export function buildSizeQueryCommand(client: string, contentId: string): Command {
  return {
    executable: client,
    args: ['+app_info_update', '1', '+app_info_print', contentId, '+quit'],
  };
}

export function buildDownloadCommand(
  client: string,
  installDir: string,
  contentId: string,
  validate: boolean,
): Command {
  const args = ['+force_install_dir', installDir, '+app_update', contentId];
  if (validate) {
    args.push('validate');
  }
  args.push('+quit');
  return { executable: client, args };
}

export function buildArchiveCommand(
  archiver: string,
  format: string,
  outputPath: string,
  inputDir: string,
  volumeSize?: string,
): Command {
  const args = ['a', `-t${format}`];
  if (volumeSize) {
    args.push(`-v${volumeSize}`);
  }
  args.push(outputPath, inputDir);
  return { executable: archiver, args };
}

/**
 * Values that must never appear in logs for this credential set
 */
export function secretsOf(credentials: Credentials): string[] {
  if (credentials.anonymous) {
    return [];
  }
  return [credentials.username, credentials.password, credentials.guardCode ?? ''].filter(
    (value) => value.length > 0,
  );
}
