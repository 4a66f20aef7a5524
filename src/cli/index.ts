#!/usr/bin/env node
/**
 * @fileoverview Math Reasoning Agent CLI
 *
 * Interactive shell over the reasoning agent. Configuration comes from the
 * environment and a `.env` file in the working directory (see `loadConfig`);
 * logs go to a JSON-lines file so they do not interleave with the
 * conversation.
 *
 * Usage:
 *   OPENAI_API_KEY=... math-agent
 */

import * as readline from 'readline';
import { loadConfig, loadEnvFile, type AppConfig } from '../config/config.js';
import { ConfigError } from '../errors/errors.js';
import { FileTransport, Logger } from '../observability/logger.js';
import { OpenAICollaborator } from '../providers/openai.js';
import { ReasoningAgent } from '../agent/reasoning-agent.js';
import { InteractiveSession } from './session.js';
import { BANNER, renderError } from './format.js';

const PROMPT = '🧮 > ';

function readConfig(): AppConfig | null {
  try {
    loadEnvFile();
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(renderError(error.message, { color: true }));
      return null;
    }
    throw error;
  }
}

/**
 * Main entry point.
 */
async function main(): Promise<number> {
  const config = readConfig();
  if (config === null) {
    return 1;
  }

  const collaborator = new OpenAICollaborator({
    apiKey: config.apiKey,
    endpoint: config.baseUrl,
    model: config.model,
  });
  if (!collaborator.validate()) {
    console.error(renderError('OPENAI_API_KEY is not set.', { color: true }));
    return 1;
  }

  const transport = new FileTransport(config.logFile);
  const logger = new Logger({ module: 'cli', minLevel: config.logLevel, transports: [transport] });

  const agent = new ReasoningAgent({
    collaborator,
    config: config.agent,
    logger,
  });

  const session = new InteractiveSession({
    agent,
    logger,
    write: text => console.log(`\n${text}\n`),
    color: process.stdout.isTTY,
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY,
  });

  console.log(BANNER);
  logger.info('Session started', { sessionId: agent.sessionId, model: config.model });

  try {
    rl.setPrompt(PROMPT);
    rl.prompt();
    for await (const line of rl) {
      if ((await session.handleLine(line)) === 'quit') {
        break;
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    logger.info('Session ended', { ...agent.getSessionStats() });
    await transport.close();
  }

  return 0;
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  },
);
