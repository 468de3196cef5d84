// Harness CLI Entrypoint
// Sessions and pods are created here; the feedback loop runs one pod per invocation

import * as path from 'path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { HarnessConfig, loadHarnessConfig } from './config/harnessConfig';
import { llmConfigSchema, resolveLlmConfig } from './config/llmConfig';
import { LlmClientPort } from './domain/ports/llmProvider';
import { workflowFileSchema } from './domain/schemas/workflowSteps';
import { LoopOutcome, ResultDocument } from './domain/types/types';
import { errorMessage } from './domain/types/errors';
import { WorkflowResult } from './application/services/workflow/types';
import { Harness } from './harness';
import { createLlmClient } from './infrastructure/connectors/llm/llmClientFactory';
import {
  logVerbose as logVerboseShared,
  logPerformance as logPerformanceShared,
  setLogLevel,
} from './infrastructure/adapters/logging/logger';

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`CLI:${component}`, message, data);
}

function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  logPerformanceShared(`[CLI] ${operation}`, duration, metadata);
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Create a session directory under the project root found from startDir
 */
async function initSession(harness: Harness, agentName: string, startDir: string): Promise<string> {
  const root = await harness.namer.findProjectRoot(startDir);
  logVerbose('Init', 'Project root resolved', { start_dir: startDir, root });
  return harness.namer.createSessionDir(root, agentName);
}

/**
 * Create a pod directory and write its instructions
 */
async function createPod(
  harness: Harness,
  sessionDir: string,
  podName: string,
  sessionId: string,
  instructions: string
): Promise<string> {
  const podDir = await harness.namer.createPodDir(sessionDir, podName);
  await harness.exchange.writeInstructions(instructions, podDir, sessionId);
  return podDir;
}

async function runPod(
  harness: Harness,
  podDir: string,
  configPath: string,
  options: { maxAttempts?: number; timeoutMs?: number; llmClient?: LlmClientPort }
): Promise<LoopOutcome> {
  const startTime = Date.now();
  const configFile = await harness.configLoader.load(configPath, llmConfigSchema);
  const llmConfig = resolveLlmConfig(configFile);

  const loop = harness.createPodLoop({
    podDir,
    llmClient: options.llmClient ?? createLlmClient(llmConfig.provider, harness.logger),
    llmConfig,
    maxAttempts: options.maxAttempts,
    timeoutMs: options.timeoutMs,
  });
  const outcome = await loop.run();

  logPerformance('RunPod', Date.now() - startTime, { pod_dir: podDir, status: outcome.status });
  return outcome;
}

async function aggregate(harness: Harness, podDir: string): Promise<ResultDocument[]> {
  return harness.exchange.aggregateWorkerResults(podDir);
}

/**
 * Run the steps listed in a workflow JSON file through a fresh orchestrator
 */
async function runWorkflow(
  harness: Harness,
  stepsPath: string,
  options: { root: string; sessionId?: string; maxRetries?: number }
): Promise<WorkflowResult> {
  const startTime = Date.now();
  const { steps } = await harness.configLoader.load(stepsPath, workflowFileSchema);

  const orchestrator = harness.createOrchestrator({ maxRetries: options.maxRetries });
  const result = await orchestrator.executeWithRetry(steps, { root: options.root, sessionId: options.sessionId });

  logPerformance('RunWorkflow', Date.now() - startTime, { steps_path: stepsPath, steps_executed: result.stepsExecuted });
  return result;
}

/**
 * Harness for one command, with HARNESS_* settings applied to it and to the shared logger
 */
function createHarness(): { harness: Harness; config: HarnessConfig } {
  const config = loadHarnessConfig();
  setLogLevel(config.logLevel);
  return { harness: new Harness({ config }), config };
}

interface InitOptions {
  agent?: string;
  root?: string;
}

interface PodOptions {
  session: string;
  name: string;
  sessionId?: string;
}

interface RunOptions {
  pod: string;
  config: string;
  maxAttempts?: number;
  timeoutMs?: number;
}

interface AggregateOptions {
  pod: string;
}

interface WorkflowOptions {
  steps: string;
  root?: string;
  sessionId?: string;
  maxRetries?: number;
}

function buildProgram(): Command {
  const program = new Command();
  program.name('pod-harness').description('Supervisor/worker feedback loops over pod directories');

  program
    .command('init')
    .description('Create a session directory under .agent-harness/sessions')
    .option('--agent <name>', 'Agent name embedded in the session directory name')
    .option('--root <dir>', 'Directory to start the project root search from')
    .action(async (options: InitOptions) => {
      const { harness, config } = createHarness();
      const sessionDir = await initSession(harness, options.agent ?? config.agentName, options.root ?? config.projectRoot);
      process.stdout.write(sessionDir + '\n');
    });

  program
    .command('pod')
    .description('Create a pod in a session and write its instructions.json')
    .requiredOption('--session <dir>', 'Session directory')
    .requiredOption('--name <name>', 'Pod name')
    .option('--session-id <id>', 'Session id recorded in instructions.json (defaults to the session directory name)')
    .argument('<instructions...>', 'Instruction text')
    .action(async (instructions: string[], options: PodOptions) => {
      const { harness } = createHarness();
      const sessionDir = path.resolve(options.session);
      const sessionId = options.sessionId ?? path.basename(sessionDir);
      const podDir = await createPod(harness, sessionDir, options.name, sessionId, instructions.join(' '));
      process.stdout.write(podDir + '\n');
    });

  program
    .command('run')
    .description('Run the feedback loop for one pod until PASS or the attempt ceiling')
    .requiredOption('--pod <dir>', 'Pod directory')
    .requiredOption('--config <path>', 'LLM config JSON file')
    .option('--max-attempts <n>', 'Attempt ceiling (default HARNESS_MAX_ATTEMPTS or 3)', parsePositiveInt)
    .option('--timeout-ms <n>', 'Per-attempt worker timeout in milliseconds', parsePositiveInt)
    .action(async (options: RunOptions) => {
      const { harness } = createHarness();
      const outcome = await runPod(harness, path.resolve(options.pod), options.config, {
        maxAttempts: options.maxAttempts,
        timeoutMs: options.timeoutMs,
      });
      process.stdout.write(JSON.stringify(outcome, null, 2) + '\n');
      if (outcome.status !== 'PASS') {
        process.exitCode = 1;
      }
    });

  program
    .command('aggregate')
    .description('Print the result documents of every worker in a pod')
    .requiredOption('--pod <dir>', 'Pod directory')
    .action(async (options: AggregateOptions) => {
      const { harness } = createHarness();
      const results = await aggregate(harness, path.resolve(options.pod));
      process.stdout.write(JSON.stringify(results, null, 2) + '\n');
    });

  program
    .command('workflow')
    .description('Run the setup steps of a workflow file with retries, checkpoints and rollback')
    .requiredOption('--steps <path>', 'Workflow JSON file with a "steps" array')
    .option('--root <dir>', 'Project root for session and file steps (default HARNESS_PROJECT_ROOT or cwd)')
    .option('--session-id <id>', 'Session id for write_instructions when no create_session step runs')
    .option('--max-retries <n>', 'Attempts per step (default HARNESS_MAX_RETRIES or 3)', parsePositiveInt)
    .action(async (options: WorkflowOptions) => {
      const { harness, config } = createHarness();
      const result = await runWorkflow(harness, options.steps, {
        root: path.resolve(options.root ?? config.projectRoot),
        sessionId: options.sessionId,
        maxRetries: options.maxRetries,
      });
      process.stdout.write(JSON.stringify(result, null, 2) + '\n');
    });

  return program;
}

// Only parse if this file is being run directly (not imported)
if (process.argv[1] && (process.argv[1].endsWith('cli.ts') || process.argv[1].endsWith('cli.js'))) {
  dotenv.config();
  buildProgram()
    .parseAsync()
    .catch((error: unknown) => {
      process.stderr.write(`Error: ${errorMessage(error)}\n`);
      process.exit(1);
    });
}

export { buildProgram, initSession, createPod, runPod, aggregate, runWorkflow };
