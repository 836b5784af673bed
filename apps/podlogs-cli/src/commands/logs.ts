/**
 * `podlogs PATTERN...` - Stream logs from every container of the matching pods
 */

import { Args } from '@oclif/core';
import { createLogger, KubectlClient, runPodLogs, type StreamSummary } from '@podlogs/core';
import { BaseCommand } from '../base-command.js';
import { logFlags, toLogOptions } from '../lib/flags.js';

export default class Logs extends BaseCommand {
  static description =
    'Print the logs of every container in the pods whose name matches a regular expression';

  static usage = '[-f] [-p] PATTERN... [-c CONTAINER] [flags]';

  static examples = [
    '<%= config.bin %> my-pod-v1',
    '<%= config.bin %> my-pod-v1 -c my-container',
    "<%= config.bin %> '^api-' worker -f",
    '<%= config.bin %> my-pod-v1 --since 10m',
    '<%= config.bin %> . --tail 1 -n kube-system',
  ];

  // Patterns are variadic
  static strict = false;

  static args = {
    pattern: Args.string({
      description: 'Regular expression matched against pod names (substring search)',
      required: true,
    }),
  };

  static flags = logFlags;

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(Logs);
    const patterns = argv.filter((arg): arg is string => typeof arg === 'string');

    const settings = await this.loadSettings({
      namespace: flags.namespace,
      kubectl: flags.kubectl,
      maxConcurrency: flags['max-concurrency'],
      colorOutput: flags.color,
    });

    const logger = createLogger({
      level: flags.debug ? 'debug' : 'info',
      color: settings.colorOutput,
    });
    const kubectl = new KubectlClient({ binary: settings.kubectl, logger });

    let summary: StreamSummary;
    try {
      summary = await runPodLogs(
        {
          patterns,
          namespace: settings.namespace,
          containerFilter: flags.container ?? '',
          logOptions: toLogOptions(flags),
          maxConcurrency: settings.maxConcurrency,
        },
        { kubectl, logger }
      );
    } catch (error) {
      this.fail(error);
    }

    // Failed streams were already reported; they do not change the exit status
    logger.debug(`${summary.succeeded}/${summary.tasks} log streams exited cleanly`);
  }
}
