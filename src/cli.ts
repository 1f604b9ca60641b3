#!/usr/bin/env node
// 환경변수 로드 (다른 모듈보다 먼저)
import 'dotenv/config';
import path from 'path';
import { loadConfig } from './config';
import { createServices } from './services/container';
import { createProgram } from './cli/program';
import { ReadlinePrompter } from './cli/prompt';
import logger, { applyLogLevel } from './utils/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  applyLogLevel(config.logLevel);
  const prompter = new ReadlinePrompter();

  const program = createProgram({
    servicesFor: inventoryFile => createServices(
      inventoryFile ? { ...config, inventoryFile: path.resolve(inventoryFile) } : config
    ),
    prompter,
    io: {
      out: line => console.log(line),
      err: line => console.error(line),
      setExitCode: code => {
        process.exitCode = code;
      },
    },
  });

  try {
    await program.parseAsync(process.argv);
  } finally {
    prompter.close();
  }
}

main().catch((error: unknown) => {
  logger.error(`Unexpected failure: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  process.exitCode = 1;
});
