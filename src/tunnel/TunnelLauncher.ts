import { logger } from '../utils/logger';
import { Command, ProcessRunner } from '../process/ProcessRunner';

export type UdpTunnelType = 'basic' | 'custom_port' | 'custom_to' | 'reserved';

export interface UdpTunnelOptions {
  type: UdpTunnelType;
  port?: string;
  to?: string;
  reservedEndpoint?: string;
}

/**
 * Build the arguments for a UDP tunnel. Options a type does not use are ignored.
 */
export function buildUdpTunnelArgs(options: UdpTunnelOptions): string[] {
  const args = ['tunnel', 'udp'];
  switch (options.type) {
    case 'custom_port':
      if (options.port) {
        args.push('--port', options.port);
      }
      break;
    case 'custom_to':
      if (options.port && options.to) {
        args.push('--port', options.port, '--to', options.to);
      }
      break;
    case 'reserved':
      if (options.reservedEndpoint) {
        args.push('--reserved-endpoint', options.reservedEndpoint);
      }
      break;
    case 'basic':
      break;
  }
  return args;
}

/**
 * TunnelLauncher - starts the external tunnel binary that exposes the local
 * HTTP port publicly. The binary is opaque; its output is only logged.
 */
export class TunnelLauncher {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly binary: string,
    private readonly authToken?: string,
  ) {}

  isEnabled(): boolean {
    return !!this.authToken;
  }

  /**
   * Expose http://localhost:<port>. Resolves false when no auth token is set
   * or the binary could not be spawned.
   */
  async startHttp(port: number): Promise<boolean> {
    if (!this.authToken) {
      logger.info('Tunnel disabled: no auth token configured');
      return false;
    }
    return this.launch(
      {
        executable: this.binary,
        args: ['tunnel', 'http', '--to', `http://localhost:${port}`, '--authtoken', this.authToken],
      },
      [this.authToken],
    );
  }

  async startUdp(options: UdpTunnelOptions): Promise<boolean> {
    return this.launch({ executable: this.binary, args: buildUdpTunnelArgs(options) }, []);
  }

  private async launch(command: Command, secrets: string[]): Promise<boolean> {
    const proc = this.runner.start(command, { secrets, tag: 'tunnel' });
    if (!(await proc.started)) {
      logger.error('❌ Tunnel process could not be started', { command: proc.label });
      return false;
    }
    logger.info('🌐 Tunnel process started', { command: proc.label, pid: proc.pid });

    const pump = async (): Promise<void> => {
      for await (const line of proc.lines()) {
        logger.info(`[tunnel] ${line}`);
      }
      const exit = await proc.wait();
      logger.warn('Tunnel process exited', { code: exit.code, stderr: exit.stderr });
    };

    pump().catch((error: unknown) => {
      logger.error('Tunnel output reader failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return true;
  }
}
