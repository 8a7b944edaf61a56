#!/usr/bin/env node
import { RelayAgent } from './agent';
import { describeError } from './common/errors';
import { DEFAULT_CONFIG_PATH } from './config/config';

const configPath = process.argv[2] ?? process.env.AGENT_CONFIG ?? DEFAULT_CONFIG_PATH;

let agent: RelayAgent;
try {
  agent = RelayAgent.fromFile(configPath);
} catch (error) {
  // No log file exists yet at this point.
  console.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
}

agent.start();

let stopping = false;
const shutdown = (signal: NodeJS.Signals): void => {
  if (stopping) {
    return;
  }
  stopping = true;
  console.log(`Received ${signal}, shutting down`);
  agent
    .stop()
    .then(() => process.exit(0))
    .catch(error => {
      console.error(`Error during shutdown: ${describeError(error)}`);
      process.exit(1);
    });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
