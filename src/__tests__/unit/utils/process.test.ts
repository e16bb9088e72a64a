import { describe, it, expect } from '@jest/globals';
import { dirname } from 'node:path';
import { findExecutable, runCommand } from '../../../core/utils/process.js';

describe('Process helpers', () => {
  describe('findExecutable', () => {
    it('should search PATH', () => {
      const nodeDir = dirname(process.execPath);
      const name = process.execPath.slice(nodeDir.length + 1);

      expect(findExecutable(name, `/nonexistent:${nodeDir}`)).toBe(process.execPath);
    });

    it('should check paths as given', () => {
      expect(findExecutable(process.execPath, '')).toBe(process.execPath);
      expect(findExecutable('/nonexistent/aws', '')).toBeUndefined();
    });

    it('should return undefined for unknown commands', () => {
      expect(findExecutable('awrap-no-such-command', '/nonexistent')).toBeUndefined();
    });
  });

  describe('runCommand', () => {
    it('should capture output and pass input', async () => {
      const result = await runCommand(
        process.execPath,
        ['-e', "process.stdin.pipe(process.stdout); process.stderr.write('warn')"],
        { input: 'payload' }
      );

      expect(result).toEqual({ exitCode: 0, stdout: 'payload', stderr: 'warn' });
    });

    it('should report the exit code', async () => {
      const result = await runCommand(process.execPath, ['-e', 'process.exit(44)']);
      expect(result.exitCode).toBe(44);
    });

    it('should fail when the command cannot start', async () => {
      await expect(runCommand('/nonexistent/awrap-tool', [])).rejects.toThrow(
        'Failed to start /nonexistent/awrap-tool'
      );
    });
  });
});
