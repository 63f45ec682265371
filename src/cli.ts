#!/usr/bin/env node

import readline from 'node:readline';
import chalk from 'chalk';

import { AppBootstrapper, type AppRuntime } from './bootstrap/AppBootstrapper.js';
import { parseCommand, USAGE, UsageError, type Command } from './commands.js';
import { withTrace } from './observability/trace.js';
import { extractVideoId } from './transcript/index.js';
import { errorMessage, PipelineError } from './utils/errors.js';
import { SimpleLogger } from './utils/SimpleLogger.js';

async function serve(command: Extract<Command, { name: 'serve' }>): Promise<void> {
  const bootstrapper = await AppBootstrapper.fromEnvironment({ configPath: command.configPath });
  const runtime = await bootstrapper.start();

  const shutdown = (signal: string) => {
    runtime.logger.info(`Received ${signal}, shutting down`);
    bootstrapper.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(chalk.red(`Shutdown failed: ${errorMessage(error)}`));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function ingest(command: Extract<Command, { name: 'ingest' }>): Promise<void> {
  const bootstrapper = await AppBootstrapper.fromEnvironment({ configPath: command.configPath, logger: new SimpleLogger('info') });
  try {
    const { ingestion } = bootstrapper.bootstrap();
    const result = await withTrace(() =>
      ingestion.ingestVideo(command.video, {
        languages: command.languages,
        force: command.force,
        embeddingModel: command.embeddingModel
      })
    );
    const label = result.status === 'ingested' ? chalk.green('ingested') : chalk.yellow(result.status);
    console.log(`${label} ${chalk.bold(result.sourceId)}: ${result.passages} passages with ${result.embeddingModel}` +
      (result.language ? ` (${result.language})` : ''));
  } finally {
    await bootstrapper.stop();
  }
}

async function chat(runtime: AppRuntime, sessionId: string, command: Extract<Command, { name: 'ask' }>): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: chalk.cyan('you> ') });
  rl.prompt();
  for await (const line of rl) {
    const question = line.trim();
    if (question === 'exit' || question === 'quit') break;
    if (question.length > 0) {
      try {
        const result = await withTrace(() =>
          runtime.questions.ask(sessionId, question, {
            embeddingModel: command.embeddingModel,
            model: command.model
          })
        );
        console.log(`${chalk.green('assistant>')} ${result.answer}`);
        if (result.sources.length > 0) {
          const scores = result.sources.map((s) => `#${s.chunkIndex} ${s.score.toFixed(3)}`).join(', ');
          console.log(chalk.dim(`  sources: ${scores}`));
        }
      } catch (error) {
        console.error(chalk.red(errorMessage(error)));
      }
    }
    rl.prompt();
  }
  rl.close();
}

async function ask(command: Extract<Command, { name: 'ask' }>): Promise<void> {
  const bootstrapper = await AppBootstrapper.fromEnvironment({ configPath: command.configPath, logger: new SimpleLogger('warn') });
  try {
    const runtime = bootstrapper.bootstrap();
    const videoId = extractVideoId(command.video);

    const ingested = await runtime.ingestion.ingestVideo(videoId, {
      languages: command.languages,
      embeddingModel: command.embeddingModel
    });
    if (ingested.status === 'ingested') {
      console.log(chalk.dim(`Ingested ${ingested.passages} passages for ${videoId}`));
    }

    const session = await runtime.questions.startSession(videoId, { client: 'cli' });
    console.log(chalk.bold(`Asking about ${videoId}. Type 'exit' to quit.`));
    await chat(runtime, session.sessionId, command);
  } finally {
    await bootstrapper.stop();
  }
}

async function main(argv: readonly string[]): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(chalk.red(error.message));
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  switch (command.name) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'serve':
      await serve(command);
      return 0;
    case 'ingest':
      await ingest(command);
      return 0;
    case 'ask':
      await ask(command);
      return 0;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const code = error instanceof PipelineError ? ` [${error.code}]` : '';
    console.error(chalk.red(`Error${code}: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
);
