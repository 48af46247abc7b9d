import { ProcessRegistry } from '../src/process/ProcessRegistry';
import { Command, ProcessRunner } from '../src/process/ProcessRunner';
import { NonZeroExitError, TimeoutError } from '../src/session/errors';

const shell = (script: string): Command => ({ executable: '/bin/sh', args: ['-c', script] });

describe('ProcessRunner', () => {
  let registry: ProcessRegistry;
  let runner: ProcessRunner;

  beforeEach(() => {
    registry = new ProcessRegistry(500);
    runner = new ProcessRunner(registry);
  });

  afterEach(async () => {
    await registry.terminateAll();
  });

  it('streams stdout line by line', async () => {
    const seen: string[] = [];
    const exit = await runner.run(shell('echo one; echo two'), {}, (line) => seen.push(line));

    expect(seen).toEqual(['one', 'two']);
    expect(exit.output).toEqual(['one', 'two']);
    expect(exit.stdout).toBe('one\ntwo\n');
    expect(exit.code).toBe(0);
  });

  it('drops lines containing the redacted value from captured output', async () => {
    const seen: string[] = [];
    const exit = await runner.run(
      shell('echo "Logging in user player"; echo ready'),
      { redact: 'player' },
      (line) => seen.push(line),
    );

    expect(seen).toEqual(['ready']);
    expect(exit.output).toEqual(['ready']);
    expect(exit.stdout).toContain('Logging in user player');
  });

  it('rejects with the exit code and stderr on failure', async () => {
    const result = runner.run(shell('echo partial; echo broken >&2; exit 3'));

    await expect(result).rejects.toBeInstanceOf(NonZeroExitError);
    await expect(result).rejects.toMatchObject({
      exitCode: 3,
      stderr: 'broken',
      stdout: 'partial\n',
    });
  });

  it('kills the process when the timeout elapses', async () => {
    const started = Date.now();
    await expect(
      runner.run(shell('exec sleep 5'), { timeoutMs: 200 }),
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(Date.now() - started).toBeLessThan(4000);
    expect(registry.size()).toBe(0);
  });

  it('kills processes started by a wrapper script when the timeout elapses', async () => {
    const started = Date.now();
    await expect(
      runner.run(shell('sleep 4; echo late'), { timeoutMs: 200 }),
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(Date.now() - started).toBeLessThan(2000);
    expect(registry.size()).toBe(0);
  });

  it('reports whether the process could be spawned', async () => {
    const running = runner.start(shell('exit 0'));
    const missing = runner.start({ executable: '/nonexistent/tool', args: [] });

    expect(await running.started).toBe(true);
    expect(await missing.started).toBe(false);
    await running.wait();
  });

  it('allows the output to be iterated only once', async () => {
    const proc = runner.start(shell('echo once'));
    const lines: string[] = [];
    for await (const line of proc.lines()) {
      lines.push(line);
    }

    expect(lines).toEqual(['once']);
    await expect(proc.lines().next()).rejects.toThrow('already been consumed');
    await proc.wait();
  });

  it('drains unread output when waited on', async () => {
    const proc = runner.start(shell('echo a; echo b'));
    const exit = await proc.wait();

    expect(exit.output).toEqual(['a', 'b']);
  });

  it('registers running processes until they exit', async () => {
    const proc = runner.start(shell('exec sleep 30'), { tag: 'task-1' });
    expect(registry.size()).toBe(1);
    expect(registry.pids()).toEqual([proc.pid]);

    expect(await registry.terminateTagged('task-1')).toBe(1);
    const exit = await proc.wait();

    expect(exit.signal).toBe('SIGTERM');
    expect(registry.size()).toBe(0);
  });

  it('terminates the children of a tagged wrapper script', async () => {
    const proc = runner.start(shell('sleep 30; echo late'), { tag: 'task-4' });
    const started = Date.now();

    expect(await registry.terminateTagged('task-4')).toBe(1);
    const exit = await proc.wait();

    expect(exit.output).toEqual([]);
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('leaves processes with other tags alone', async () => {
    const proc = runner.start(shell('exec sleep 30'), { tag: 'task-2' });

    expect(await registry.terminateTagged('task-3')).toBe(0);
    expect(registry.size()).toBe(1);

    proc.kill('SIGKILL');
    await proc.wait();
    expect(registry.size()).toBe(0);
  });

  it('force-kills processes that ignore SIGTERM', async () => {
    const proc = runner.start(shell("trap '' TERM; echo armed; while :; do sleep 0.1; done"));
    const lines = proc.lines();
    await lines.next();

    expect(await registry.terminateAll()).toBe(1);
    let next = await lines.next();
    while (!next.done) {
      next = await lines.next();
    }
    const exit = await proc.wait();

    expect(exit.signal).toBe('SIGKILL');
  });
});
