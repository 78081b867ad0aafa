import { Worker } from 'worker_threads';
import { z } from 'zod';
import type { Dataset, DatasetColumn, ExecutionOutcome } from '../types';
import { ExecutionError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { extractCode } from './codeBlocks';
import {
  ENTRY_CALL,
  ENTRY_POINT,
  FRAME_PRELUDE,
  MODULE_SHIM,
  STATS_BINDING,
  WORKER_BOOTSTRAP,
} from './contextScripts';

const logger = createLogger('CodeSandbox');

// Time allowed for worker startup and library loading on top of the script timeout.
const STARTUP_GRACE_MS = 5000;

const Logs = z.array(z.string()).default([]);

const WorkerReplySchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ok'), success: z.boolean(), pValue: z.number().nullable(), logs: Logs }),
  z.object({ status: z.literal('missing'), logs: Logs }),
  z.object({ status: z.literal('shape'), received: z.string(), logs: Logs }),
  z.object({ status: z.literal('error'), message: z.string(), logs: Logs }),
]);

type WorkerReply = z.infer<typeof WorkerReplySchema>;

export interface SandboxOptions {
  timeoutMs: number;
  memoryMb: number;
}

function serializeColumn(column: DatasetColumn): { name: string; kind: string; values: (number | string | null)[] } {
  if (column.kind === 'temporal') {
    return {
      name: column.name,
      kind: column.kind,
      values: column.values.map((value) => (value === null ? null : value.getTime())),
    };
  }
  return { name: column.name, kind: column.kind, values: column.values };
}

/**
 * Runs generated analysis code against a dataset. The code sees `df`, `stats`
 * (simple-statistics) and a capturing `console`, and nothing of the host.
 * Each run gets its own worker thread, bounded in time and heap size.
 */
export class CodeSandbox {
  private readonly statsPath = require.resolve('simple-statistics');

  constructor(private readonly options: SandboxOptions) {}

  async execute(source: string, dataset: Dataset): Promise<ExecutionOutcome> {
    const code = extractCode(source);
    const reply = await this.run(code, dataset);
    if (reply.logs.length > 0) {
      logger.debug(`Analysis output:\n${reply.logs.join('\n')}`);
    }

    switch (reply.status) {
      case 'missing':
        throw new ExecutionError(`Code execution error: ${ENTRY_POINT} function not found`);
      case 'shape':
        throw new ExecutionError(
          `Code execution error: ${ENTRY_POINT} must return [success, pValue], got ${reply.received}`
        );
      case 'error':
        throw new ExecutionError(`Code execution error: ${reply.message}`);
      case 'ok':
        if (reply.pValue === null || reply.pValue < 0 || reply.pValue > 1) {
          throw new ExecutionError(
            `Code execution error: ${ENTRY_POINT} returned a p-value outside [0, 1]: ${String(reply.pValue)}`
          );
        }
        return { success: reply.success, pValue: reply.pValue };
    }
  }

  private run(code: string, dataset: Dataset): Promise<WorkerReply> {
    const { timeoutMs, memoryMb } = this.options;
    const payload = JSON.stringify({ rowCount: dataset.rowCount, columns: dataset.columns.map(serializeColumn) });

    return new Promise<WorkerReply>((resolve, reject) => {
      const worker = new Worker(WORKER_BOOTSTRAP, {
        eval: true,
        workerData: {
          payload,
          code,
          timeoutMs,
          statsPath: this.statsPath,
          moduleShim: MODULE_SHIM,
          statsBinding: STATS_BINDING,
          prelude: FRAME_PRELUDE,
          entryCall: ENTRY_CALL,
        },
        resourceLimits: {
          maxOldGenerationSizeMb: memoryMb,
          maxYoungGenerationSizeMb: Math.max(4, Math.floor(memoryMb / 8)),
        },
        env: {},
        stdout: true,
        stderr: true,
      });
      worker.stdout.resume();
      worker.stderr.resume();

      let settled = false;
      const settle = (action: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        action();
        void worker.terminate().catch((error: unknown) => {
          logger.warn('Failed to terminate analysis worker', error);
        });
      };

      const timer = setTimeout(() => {
        settle(() => reject(new ExecutionError(`Code execution error: timed out after ${timeoutMs} ms`)));
      }, timeoutMs + STARTUP_GRACE_MS);

      worker.on('message', (message: unknown) => {
        const parsed = WorkerReplySchema.safeParse(message);
        settle(() =>
          parsed.success
            ? resolve(parsed.data)
            : reject(new ExecutionError('Code execution error: malformed reply from analysis worker'))
        );
      });
      worker.on('error', (error: Error) => {
        settle(() => reject(new ExecutionError(`Code execution error: ${error.message}`)));
      });
      worker.on('exit', (exitCode: number) => {
        settle(() => reject(new ExecutionError(`Code execution error: analysis worker exited with code ${exitCode}`)));
      });
    });
  }
}
