import { describe, expect, it } from 'vitest';
import { KubectlClient } from './kubectl/kubectl-client.js';
import { runPodLogs } from './run.js';
import { createCaptureLogger, FakeExecutor } from './testing/fake-kubectl.js';
import { ExternalToolError, PatternCompileError } from './utils/errors.js';

function setup(discovery: { stdout: string; stderr?: string; exitCode?: number }) {
  const executor = new FakeExecutor({
    run: () => ({ stdout: discovery.stdout, stderr: discovery.stderr ?? '', exitCode: discovery.exitCode ?? 0 }),
    spawn: (child) => {
      if (child.container === 'sidecar') {
        child.finish({ code: 2 });
      } else {
        child.finish({ stdout: ['ready'] });
      }
    },
  });
  const { logger, out, err } = createCaptureLogger();
  const kubectl = new KubectlClient({ executor, logger });
  return { executor, kubectl, logger, out, err };
}

describe('runPodLogs', () => {
  it('should stream every container of the matching pods', async () => {
    const { executor, kubectl, logger, out, err } = setup({ stdout: 'pod-a web sidecar|pod-b web|' });

    const summary = await runPodLogs(
      { patterns: ['pod-a'], namespace: 'default', logOptions: { tail: 1 } },
      { kubectl, logger }
    );

    expect(summary).toEqual({ tasks: 2, succeeded: 1, failed: 1 });
    expect(executor.spawned.map((child) => child.args)).toEqual([
      ['logs', 'pod-a', '--namespace=default', '--tail=1', '--container=web'],
      ['logs', 'pod-a', '--namespace=default', '--tail=1', '--container=sidecar'],
    ]);
    expect(out[0]).toBe('Streaming logs for 1 pod(s)');
    expect(out).toContain('[pod-a web] ready');
    expect(err).toEqual(['[pod-a sidecar] exited with code 2']);
  });

  it('should only stream the filtered container', async () => {
    const { executor, kubectl, logger } = setup({ stdout: 'pod-a web sidecar|pod-b web|' });

    const summary = await runPodLogs(
      { patterns: ['pod'], namespace: 'default', containerFilter: 'web' },
      { kubectl, logger }
    );

    expect(summary).toEqual({ tasks: 2, succeeded: 2, failed: 0 });
    expect(executor.spawned.map((child) => `${child.args[1]} ${child.container}`)).toEqual([
      'pod-a web',
      'pod-b web',
    ]);
  });

  it('should launch nothing when a pattern is invalid', async () => {
    const { executor, kubectl, logger } = setup({ stdout: 'pod-a web|' });

    await expect(
      runPodLogs({ patterns: ['('], namespace: 'default' }, { kubectl, logger })
    ).rejects.toBeInstanceOf(PatternCompileError);
    expect(executor.runCalls).toHaveLength(0);
    expect(executor.spawned).toHaveLength(0);
  });

  it('should launch nothing when discovery fails', async () => {
    const { executor, kubectl, logger } = setup({ stdout: '', stderr: 'Unauthorized', exitCode: 1 });

    await expect(
      runPodLogs({ patterns: ['pod'], namespace: 'default' }, { kubectl, logger })
    ).rejects.toBeInstanceOf(ExternalToolError);
    expect(executor.spawned).toHaveLength(0);
  });
});
