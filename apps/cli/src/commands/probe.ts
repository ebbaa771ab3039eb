/**
 * Probe Command
 *
 * Describe an audio file without touching it.
 */

import ora from 'ora';
import { resolve } from 'node:path';
import { DurationProber, FFProbe } from '@splitwave/media';
import { buildEngineConfig } from '../config/index.js';
import { describeFailure, sourceDetails } from '../lib/format.js';
import { printDetails, printError, printHeader, printJson } from '../lib/output.js';

interface ProbeOptions {
  json?: boolean;
}

export async function probeCommand(input: string, options: ProbeOptions): Promise<void> {
  const spinner = ora('Probing audio file...').start();

  try {
    const config = buildEngineConfig();
    const prober = new DurationProber(new FFProbe(config.ffprobePath));
    const source = await prober.probe(resolve(input));
    spinner.stop();

    if (options.json) {
      printJson(source);
      return;
    }

    printHeader('Source Audio');
    printDetails(sourceDetails(source));
  } catch (error) {
    spinner.fail('Probe failed');
    printError(describeFailure(error));
    process.exit(1);
  }
}
