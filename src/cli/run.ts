import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

import { launchBrowser } from '../browser/index.js';
import { ConfigError, LIMITS, TIMEOUTS, loadConfigFile, loadCredentials } from '../config/index.js';
import { replayTrace, runTaskInBrowser } from '../core/index.js';
import type { ReplayResult } from '../core/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient, LLMConfig } from '../llm/index.js';
import { generateTraceDocument, serializeJSON } from '../report/index.js';
import type { FileConfig, Trace } from '../schema/index.js';
import { exitCodeFor, parseTraceDocument } from '../schema/index.js';

const RUNTIME_ERROR_EXIT = 4;

// ── Option parsing ───────────────────────────────────────────

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return n;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Abort on Ctrl-C ──────────────────────────────────────────

function abortOnInterrupt(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    process.stderr.write('\nInterrupt received; stopping after the current step\n');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => process.off('SIGINT', onInterrupt),
  };
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(trace: Trace, tracePath: string): void {
  const succeeded = trace.steps.length - trace.failureCount;

  process.stderr.write(`\n--- pagepilot Result ---\n`);
  process.stderr.write(`URL:     ${trace.startUrl}\n`);
  process.stderr.write(`Task:    ${trace.task}\n`);
  process.stderr.write(`Status:  ${trace.status} (${trace.stopReason})\n`);
  process.stderr.write(
    `Steps:   ${String(succeeded)} succeeded, ${String(trace.failureCount)} failed\n`,
  );
  if (trace.error !== undefined) {
    process.stderr.write(`Error:   ${trace.error}\n`);
  }
  process.stderr.write(`Time:    ${(trace.durationMs / 1000).toFixed(1)}s\n`);
  process.stderr.write(`Trace:   ${tracePath}\n`);
  process.stderr.write(`Run ID:  ${trace.runId}\n\n`);
}

function printReplay(result: ReplayResult): void {
  process.stderr.write(`\n--- pagepilot Replay ---\n`);
  for (const step of result.steps) {
    const mark = step.matches ? 'same' : 'DIFFERENT';
    process.stderr.write(`${String(step.index + 1)}. ${mark}\n`);
    if (!step.matches) {
      process.stderr.write(`   expected +[${step.expectedAppeared.join(', ')}] -[${step.expectedDisappeared.join(', ')}]\n`);
      process.stderr.write(`   actual   +[${step.actualAppeared.join(', ')}] -[${step.actualDisappeared.join(', ')}]\n`);
    }
  }
  process.stderr.write(`Result:  ${result.matches ? 'reproduced' : 'diverged'}\n\n`);
}

// ── Shared run options ───────────────────────────────────────

interface RunFlags {
  json?: true;
  outputDir?: string;
  maxSteps?: number;
  headless?: true;
  timeout?: number;
  cookie?: string;
}

function withRunOptions(command: Command): Command {
  return command
    .option('--json', 'Output the trace document as JSON to stdout')
    .option('--output-dir <dir>', 'Artifact directory')
    .option('--max-steps <n>', `Step budget (default ${String(LIMITS.MAX_STEPS)})`, parseCount)
    .option('--headless', 'Run browser headless')
    .option(
      '--timeout <seconds>',
      `Total run timeout in seconds (default ${String(TIMEOUTS.TOTAL_RUN_TIMEOUT / 1000)})`,
      parseSeconds,
    )
    .option('--cookie <string>', 'Pre-authenticated cookie string');
}

async function runOne(
  client: LLMClient,
  params: {
    url: string;
    task: string;
    outputDir: string;
    maxSteps: number;
    timeoutSec: number;
    headless: boolean;
    cookie?: string | undefined;
    json: boolean;
  },
): Promise<number> {
  const interrupt = abortOnInterrupt();
  try {
    const { trace, tracePath } = await runTaskInBrowser(client, {
      task: params.task,
      url: params.url,
      headless: params.headless,
      outputDir: params.outputDir,
      maxSteps: params.maxSteps,
      totalTimeoutMs: params.timeoutSec * 1000,
      cookie: params.cookie,
      credentials: loadCredentials(),
      signal: interrupt.signal,
    });

    if (params.json) {
      process.stdout.write(serializeJSON(generateTraceDocument(trace)) + '\n');
    }
    printSummary(trace, tracePath);
    return exitCodeFor(trace.status);
  } finally {
    interrupt.dispose();
  }
}

// ── run <url> <task> ─────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  withRunOptions(
    program
      .command('run')
      .description('Drive a browser toward a natural-language task')
      .argument('<url>', 'Start URL')
      .argument('<task>', 'Natural language task'),
  ).action(async (url: string, task: string, opts: RunFlags) => {
    try {
      const client = createLLMClient(loadLLMConfig());
      process.exitCode = await runOne(client, {
        url,
        task,
        outputDir: path.resolve(opts.outputDir ?? '.artifacts'),
        maxSteps: opts.maxSteps ?? LIMITS.MAX_STEPS,
        timeoutSec: opts.timeout ?? TIMEOUTS.TOTAL_RUN_TIMEOUT / 1000,
        headless: opts.headless ?? false,
        cookie: opts.cookie,
        json: opts.json ?? false,
      });
    } catch (err) {
      process.stderr.write(`Error: ${errorMessage(err)}\n`);
      process.exitCode = RUNTIME_ERROR_EXIT;
    }
  });
}

// ── batch --config <file> ────────────────────────────────────

export function registerBatchCommand(program: Command): void {
  withRunOptions(
    program
      .command('batch')
      .description('Run the tasks listed in a .pagepilot.yaml config file')
      .option('--config <path>', 'Path to config file', '.pagepilot.yaml')
      .option('--task <name>', 'Run a single task by name'),
  ).action(async (opts: RunFlags & { config: string; task?: string }) => {
    let config: FileConfig;
    try {
      config = await loadConfigFile(opts.config);
    } catch (err) {
      const prefix = err instanceof ConfigError ? 'Config error' : 'Error';
      process.stderr.write(`${prefix}: ${errorMessage(err)}\n`);
      process.exitCode = RUNTIME_ERROR_EXIT;
      return;
    }

    const tasks = opts.task !== undefined
      ? config.tasks.filter((t) => t.name === opts.task)
      : config.tasks;

    if (tasks.length === 0) {
      process.stderr.write(`No task named "${opts.task ?? ''}" found in config\n`);
      process.exitCode = RUNTIME_ERROR_EXIT;
      return;
    }

    let llmConfig: LLMConfig;
    try {
      // Config provider/model override env; the key follows the provider
      llmConfig = loadLLMConfig(process.env, { provider: config.provider, model: config.model });
    } catch (err) {
      process.stderr.write(`Error: ${errorMessage(err)}\n`);
      process.exitCode = RUNTIME_ERROR_EXIT;
      return;
    }

    let worstExitCode = 0;

    for (const entry of tasks) {
      process.stderr.write(`\nRunning task: ${entry.name}\n`);
      try {
        const client = createLLMClient(llmConfig);
        const exitCode = await runOne(client, {
          url: entry.url,
          task: entry.task,
          outputDir: path.resolve(opts.outputDir ?? config.outputDir, entry.name),
          maxSteps: opts.maxSteps ?? entry.maxSteps ?? config.maxSteps,
          timeoutSec: opts.timeout ?? config.timeout,
          headless: opts.headless ?? config.headless,
          cookie: opts.cookie ?? config.auth?.cookie,
          json: opts.json ?? false,
        });
        worstExitCode = Math.max(worstExitCode, exitCode);
      } catch (err) {
        process.stderr.write(`Error [${entry.name}]: ${errorMessage(err)}\n`);
        worstExitCode = RUNTIME_ERROR_EXIT;
      }
    }

    process.exitCode = worstExitCode;
  });
}

// ── replay <trace> ───────────────────────────────────────────

export function registerReplayCommand(program: Command): void {
  program
    .command('replay')
    .description('Re-execute a recorded trace without the oracle and compare page changes')
    .argument('<trace>', 'Path to a trace.json')
    .option('--headless', 'Run browser headless')
    .option('--output-dir <dir>', 'Directory for replay screenshots')
    .action(async (tracePath: string, opts: { headless?: true; outputDir?: string }) => {
      try {
        const raw = await readFile(tracePath, 'utf-8');
        const document = parseTraceDocument(JSON.parse(raw));
        const outputDir = path.resolve(opts.outputDir ?? path.join(path.dirname(tracePath), 'replay'));

        const session = await launchBrowser({
          headless: opts.headless ?? false,
          screenshotDir: path.join(outputDir, 'screenshots'),
        });

        let result: ReplayResult;
        try {
          result = await replayTrace(
            document,
            { browser: session, serializer: session },
            { credentials: loadCredentials() },
          );
        } finally {
          await session.close();
        }

        printReplay(result);
        process.exitCode = result.matches ? 0 : 1;
      } catch (err) {
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
        process.exitCode = RUNTIME_ERROR_EXIT;
      }
    });
}
