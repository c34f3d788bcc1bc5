import { spawn } from 'node:child_process';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { EngineError } from '../../domain/errors.js';
import {
  defaultDiscoveryConfiguration,
  serializeDiscoveryConfiguration,
} from '../../domain/entities/DiscoveryConfiguration.js';
import { logger } from '../logger.js';
import { CONFIGURATION_ARTIFACT } from '../storage/ArtifactStore.js';
import type { DiscoveryEngine, DiscoveryRequest, DiscoveryResult } from './DiscoveryEngine.js';

const STDERR_TAIL_BYTES = 2000;

export interface ProcessDiscoveryEngineOptions {
  /** Command line; split on whitespace. Receives `<configPath> <outputDir>` as extra arguments. */
  command: string;
  cwd?: string;
  resultFile: string;
}

/**
 * Runs the discovery engine as a child process and collects the result file it writes.
 */
export class ProcessDiscoveryEngine implements DiscoveryEngine {
  private readonly executable: string;
  private readonly baseArgs: string[];

  constructor(private options: ProcessDiscoveryEngineOptions) {
    const [executable, ...baseArgs] = options.command.trim().split(/\s+/);
    if (!executable) {
      throw new EngineError('Discovery engine command is empty');
    }
    this.executable = executable;
    this.baseArgs = baseArgs;
  }

  async run(request: DiscoveryRequest): Promise<DiscoveryResult> {
    if (request.signal?.aborted) {
      throw new EngineError('Discovery engine stopped before start');
    }
    const configPath = request.configPath ?? (await this.writeDefaultConfiguration(request));
    const args = [...this.baseArgs, configPath, request.outputDir];

    logger.info('Starting discovery engine', {
      jobId: request.jobId,
      executable: this.executable,
      args,
    });

    await this.spawnAndWait(args, request);

    const resultPath = path.join(request.outputDir, this.options.resultFile);
    let content: Buffer;
    try {
      content = await readFile(resultPath);
    } catch (error) {
      throw new EngineError(`Discovery engine produced no ${this.options.resultFile}`, {
        resultPath,
        error,
      });
    }

    return { fileName: path.basename(this.options.resultFile), content };
  }

  private async writeDefaultConfiguration(request: DiscoveryRequest): Promise<string> {
    const configPath = path.join(request.outputDir, CONFIGURATION_ARTIFACT);
    const document = serializeDiscoveryConfiguration(defaultDiscoveryConfiguration(request.logPath));
    await writeFile(configPath, document, 'utf-8');
    return configPath;
  }

  private spawnAndWait(args: string[], request: DiscoveryRequest): Promise<void> {
    const { jobId, signal } = request;
    return new Promise((resolve, reject) => {
      let stderrTail = '';
      // An aborted signal kills the child and surfaces as an 'error' event
      const child = spawn(this.executable, args, {
        cwd: this.options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        signal,
      });

      child.stdout.on('data', (chunk: Buffer) => {
        logger.debug('Discovery engine output', { jobId, output: chunk.toString('utf-8').trimEnd() });
      });

      child.stderr.on('data', (chunk: Buffer) => {
        stderrTail = (stderrTail + chunk.toString('utf-8')).slice(-STDERR_TAIL_BYTES);
      });

      child.on('error', (error) => {
        if (signal?.aborted) {
          logger.warn('Discovery engine stopped', { jobId });
          reject(new EngineError('Discovery engine stopped: task withdrawn from this worker'));
          return;
        }
        reject(new EngineError(`Failed to start discovery engine: ${error.message}`, { error }));
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        const reason = signal ? `was killed by ${signal}` : `exited with code ${code}`;
        const detail = stderrTail.trim();
        reject(
          new EngineError(`Discovery engine ${reason}${detail ? `: ${detail}` : ''}`, {
            code,
            signal,
          })
        );
      });
    });
  }
}
