import { describe, expect, it, vi } from 'vitest';
import { Redeployer, buildRedeployArgs } from '../src/deploy/redeployer';
import { splitCommand, type CommandRunner } from '../src/utils/command';
import { CommandError } from '../src/utils/errors';
import { createMockLogger } from './helpers';

const deployConfig = { region: 'europe-west1', project: undefined, envVar: 'BENCH_REDEPLOY_NONCE' };

describe('buildRedeployArgs', () => {
  it('updates the env var and passes optional region and project', () => {
    expect(buildRedeployArgs('my-func', deployConfig, 'abc123')).toEqual([
      'run', 'services', 'update', 'my-func',
      '--update-env-vars', 'BENCH_REDEPLOY_NONCE=abc123',
      '--region', 'europe-west1',
      '--quiet'
    ]);
    expect(buildRedeployArgs('my-func', { envVar: 'X', project: 'bench-project' }, 'n')).toEqual([
      'run', 'services', 'update', 'my-func',
      '--update-env-vars', 'X=n',
      '--project', 'bench-project',
      '--quiet'
    ]);
  });
});

describe('Redeployer', () => {
  it('runs gcloud and returns the nonce it wrote', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '', stderr: '' });
    const redeployer = new Redeployer({
      config: deployConfig,
      runner,
      nonce: () => 'abc123',
      logger: createMockLogger()
    });

    await expect(redeployer.redeploy('my-func-graalvm')).resolves.toBe('abc123');
    expect(runner).toHaveBeenCalledWith('gcloud', buildRedeployArgs('my-func-graalvm', deployConfig, 'abc123'));
  });

  it('propagates command failures', async () => {
    const runner = vi.fn<CommandRunner>().mockRejectedValue(new CommandError('gcloud run services update', 1, 'denied'));
    const redeployer = new Redeployer({ config: deployConfig, runner, logger: createMockLogger() });

    await expect(redeployer.redeploy('my-func')).rejects.toBeInstanceOf(CommandError);
  });

  it('uses a fresh random nonce by default', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '', stderr: '' });
    const redeployer = new Redeployer({ config: deployConfig, runner, logger: createMockLogger() });

    const first = await redeployer.redeploy('my-func');
    const second = await redeployer.redeploy('my-func');

    expect(first).toMatch(/^[0-9a-f]{16}$/);
    expect(second).not.toBe(first);
  });
});

describe('splitCommand', () => {
  it('separates the executable from its arguments', () => {
    expect(splitCommand('  gcloud auth  print-identity-token ')).toEqual({
      command: 'gcloud',
      args: ['auth', 'print-identity-token']
    });
  });
});
