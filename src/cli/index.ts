#!/usr/bin/env node
/**
 * Interactive research loop
 *
 * Reads questions from stdin until "exit", runs the pipeline for each with
 * credentials from the environment, and prints the final answer.
 */

import { createInterface, type Interface } from 'readline/promises';
import { loadEnv, resolveCredentials, type AppEnv } from '../config/index.js';
import { errorMessage } from '../errors/index.js';
import { BrightDataGateway } from '../gateway/index.js';
import { createLogger } from '../logging/index.js';
import { runResearch } from '../pipeline/index.js';
import type { PipelineState } from '../types/index.js';

export type QuestionRunner = (question: string) => Promise<Pick<PipelineState, 'final_answer'>>;

export const EXIT_COMMAND = 'exit';
const PROMPT = 'Ask me anything: ';
const DIVIDER = '-'.repeat(80);

/**
 * Run the question loop until the user types "exit" or input ends
 */
export async function runCli(
  rl: Pick<Interface, 'question' | 'close'>,
  ask: QuestionRunner,
  write: (line: string) => void = (line) => console.log(line)
): Promise<void> {
  write('Multi-Source Research Agent (CLI)');
  write(`Type '${EXIT_COMMAND}' to quit\n`);

  try {
    for (;;) {
      const input = (await rl.question(PROMPT)).trim();
      if (input.toLowerCase() === EXIT_COMMAND) {
        write('Bye');
        return;
      }
      if (input.length === 0) continue;

      write('\nStarting parallel research process...');
      write('Launching Google, Bing, and Reddit searches...\n');
      try {
        const state = await ask(input);
        if (state.final_answer) {
          write(`\nFinal Answer:\n${state.final_answer}\n`);
        }
      } catch (error) {
        write(`\nResearch failed: ${errorMessage(error)}\n`);
      }
      write(DIVIDER);
    }
  } finally {
    rl.close();
  }
}

function buildRunner(env: AppEnv): QuestionRunner {
  const { modelApiKey, config } = resolveCredentials({}, {}, env);
  const gateway = new BrightDataGateway({
    apiUrl: env.BRIGHTDATA_API_URL,
    serpZone: env.SERP_ZONE,
    snapshotMaxAttempts: env.SNAPSHOT_MAX_ATTEMPTS,
    snapshotPollDelayMs: env.SNAPSHOT_POLL_DELAY_MS,
  });
  return (question) =>
    runResearch(question, config, {
      modelApiKey,
      gateway,
      logger: createLogger('pipeline', env.LOG_LEVEL),
    });
}

if (require.main === module) {
  const env = loadEnv();
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  runCli(rl, buildRunner(env)).catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
