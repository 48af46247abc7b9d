import { loadConfig } from '../src/utils/config';

const GIB = 1024 * 1024 * 1024;

describe('loadConfig', () => {
  it('applies defaults relative to the working directory', () => {
    const config = loadConfig({}, '/srv/archiver');

    expect(config.port).toBe(7860);
    expect(config.debug).toBe(false);
    expect(config.tunnelAuthToken).toBeUndefined();
    expect(config.client.path).toBe('/srv/archiver/steamcmd/steamcmd.sh');
    expect(config.client.candidates).toEqual([
      '/srv/archiver/steamcmd/steamcmd.sh',
      '/app/steamcmd/steamcmd.sh',
    ]);
    expect(config.archiver.candidates).toEqual(['7z', '7za']);
    expect(config.outputDir).toBe('/srv/archiver/output');
    expect(config.queueDir).toBe('/srv/archiver/queue');
    expect(config.session).toEqual({
      workRoot: '/srv/archiver/game',
      loginTimeoutMs: 60000,
      sizeTimeoutMs: 120000,
      loginAttempts: 3,
      loginRetryDelayMs: 10000,
      loginSettleDelayMs: 20000,
      archiveFormat: '7z',
      volumeSize: '4g',
      minFreeBytes: 10 * GIB,
      validateDownload: true,
      estimateSize: true,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        PORT: '8080',
        LOCALXPOSE_AUTHTOKEN: 'test-token',
        CLIENT_PATH: 'tools/client.sh',
        ARCHIVER_PATH: '/usr/local/bin/7zz',
        LOGIN_ATTEMPTS: '5',
        VALIDATE_DOWNLOAD: 'FALSE',
        ESTIMATE_SIZE: 'yes',
        VOLUME_SIZE: '',
      },
      '/srv/archiver',
    );

    expect(config.port).toBe(8080);
    expect(config.tunnelAuthToken).toBe('test-token');
    expect(config.client.candidates).toEqual([
      '/srv/archiver/tools/client.sh',
      '/srv/archiver/steamcmd/steamcmd.sh',
      '/app/steamcmd/steamcmd.sh',
    ]);
    expect(config.archiver.candidates).toEqual(['/usr/local/bin/7zz', '7z', '7za']);
    expect(config.session.loginAttempts).toBe(5);
    expect(config.session.validateDownload).toBe(false);
    expect(config.session.estimateSize).toBe(true);
    expect(config.session.volumeSize).toBeUndefined();
  });

  it('treats a blank auth token as absent', () => {
    expect(loadConfig({ LOCALXPOSE_AUTHTOKEN: '   ' }, '/srv').tunnelAuthToken).toBeUndefined();
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ LOGIN_ATTEMPTS: '0' }, '/srv')).toThrow(
      /^Invalid configuration: LOGIN_ATTEMPTS/,
    );
    expect(() => loadConfig({ PORT: 'not-a-port' }, '/srv')).toThrow(
      /^Invalid configuration: PORT/,
    );
    expect(() => loadConfig({ ARCHIVE_FORMAT: '7z; rm -rf /' }, '/srv')).toThrow(
      /^Invalid configuration: ARCHIVE_FORMAT/,
    );
  });
});
