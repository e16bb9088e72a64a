import { describe, it, expect, jest } from '@jest/globals';
import { EventEmitter } from 'node:events';
import { exitStatus, spawnChild, type ChildExit, type ChildHandle } from '../../../core/launcher/child.js';
import { launch, type LauncherDeps, type LaunchRequest } from '../../../core/launcher/launcher.js';
import { ExecutableNotFoundError } from '../../../core/errors.js';

class FakeChild implements ChildHandle {
  readonly pid = 4242;
  readonly forwarded: NodeJS.Signals[] = [];
  private finish: (exit: ChildExit) => void = () => undefined;
  private readonly exited = new Promise<ChildExit>((resolve) => {
    this.finish = resolve;
  });

  forwardSignal(signal: NodeJS.Signals): boolean {
    this.forwarded.push(signal);
    this.finish({ kind: 'signal', signal });
    return true;
  }

  exit(code: number): void {
    this.finish({ kind: 'code', code });
  }

  wait(): Promise<ChildExit> {
    return this.exited;
  }
}

const request: LaunchRequest = {
  command: 'aws',
  args: ['s3', 'ls'],
  credentials: { accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' },
  profileName: 'dev',
};

describe('Launcher', () => {
  describe('exitStatus', () => {
    it('should mirror exit codes', () => {
      expect(exitStatus({ kind: 'code', code: 254 })).toBe(254);
    });

    it('should map signals to 128 + N', () => {
      expect(exitStatus({ kind: 'signal', signal: 'SIGINT' })).toBe(130);
      expect(exitStatus({ kind: 'signal', signal: 'SIGTERM' })).toBe(143);
    });
  });

  describe('launch', () => {
    it('should run the command with credentials and return its exit code', async () => {
      const child = new FakeChild();
      const spawn = jest.fn<LauncherDeps['spawn']>(() => child);
      const signals = new EventEmitter();

      const pending = launch(request, {
        spawn,
        which: () => '/usr/local/bin/aws',
        signals,
        env: { HOME: '/home/alice' },
      });
      child.exit(3);

      await expect(pending).resolves.toBe(3);
      expect(spawn).toHaveBeenCalledWith('/usr/local/bin/aws', ['s3', 'ls'], {
        HOME: '/home/alice',
        AWS_ACCESS_KEY_ID: 'AKIDEXAMPLE',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_PROFILE: 'dev',
      });
    });

    it('should forward signals and remove its listeners afterwards', async () => {
      const child = new FakeChild();
      const signals = new EventEmitter();
      const onSignal = jest.fn();

      const pending = launch(request, {
        spawn: () => child,
        which: () => '/usr/local/bin/aws',
        signals,
        env: {},
        onSignal,
      });
      signals.emit('SIGINT');

      await expect(pending).resolves.toBe(130);
      expect(child.forwarded).toEqual(['SIGINT']);
      expect(onSignal).toHaveBeenCalledWith('SIGINT');
      expect(signals.listenerCount('SIGINT')).toBe(0);
      expect(signals.listenerCount('SIGTERM')).toBe(0);
    });

    it('should fail with 127 when the executable is missing', async () => {
      const spawn = jest.fn<LauncherDeps['spawn']>();

      const failure = launch(request, { spawn, which: () => undefined, signals: new EventEmitter(), env: {} });

      await expect(failure).rejects.toThrow(new ExecutableNotFoundError('aws'));
      await expect(failure).rejects.toMatchObject({ exitCode: 127 });
      expect(spawn).not.toHaveBeenCalled();
    });
  });

  describe('spawnChild', () => {
    it('should report the exit code of a real process', async () => {
      const child = spawnChild(process.execPath, ['-e', 'process.exit(7)'], {});
      await expect(child.wait()).resolves.toEqual({ kind: 'code', code: 7 });
    });

    it('should report a signal ending a real process', async () => {
      const child = spawnChild(process.execPath, ['-e', "process.kill(process.pid, 'SIGTERM')"], {});
      await expect(child.wait()).resolves.toEqual({ kind: 'signal', signal: 'SIGTERM' });
    });

    it('should report a missing executable', async () => {
      const child = spawnChild('/nonexistent/awrap-missing-binary', [], {});
      await expect(child.wait()).rejects.toBeInstanceOf(ExecutableNotFoundError);
    });
  });
});
