import { parseArgs } from 'node:util';

import { LANGUAGE_CODE } from './types/index.js';

export type Command =
  | { name: 'serve'; configPath?: string }
  | { name: 'ingest'; video: string; languages?: string[]; force: boolean; embeddingModel?: string; configPath?: string }
  | { name: 'ask'; video: string; languages?: string[]; embeddingModel?: string; model?: string; configPath?: string }
  | { name: 'help' };

export const USAGE = `Usage: transcript-qa <command> [options]

Commands:
  serve                          Start the HTTP API
  ingest <video>                 Fetch, chunk, embed and store a transcript
  ask <video>                    Ask questions about a video interactively

Options:
  --config <path>                Configuration file (default: config/app.json)
  --lang <codes>                 Comma-separated transcript languages, in order of preference
  --force                        Re-ingest even if the transcript is already stored
  --embedding-model <name>       Embedding model to use
  --model <id>                   Completion model to use (ask)
  -h, --help                     Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function languagesOf(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const languages = raw.split(',').map((l) => l.trim()).filter((l) => l.length > 0);
  if (languages.length === 0) throw new UsageError('--lang needs at least one language code');
  const invalid = languages.find((l) => !LANGUAGE_CODE.test(l));
  if (invalid !== undefined) throw new UsageError(`Invalid language code: ${invalid}`);
  return languages;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        config: { type: 'string' },
        lang: { type: 'string' },
        force: { type: 'boolean', default: false },
        'embedding-model': { type: 'string' },
        model: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false }
      }
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCommand(argv: readonly string[]): Command {
  const { values, positionals } = readArgs(argv);
  const [name, video, ...rest] = positionals;
  if (values.help || name === undefined || name === 'help') return { name: 'help' };
  if (rest.length > 0) throw new UsageError(`Unexpected arguments: ${rest.join(' ')}`);

  const configPath = values.config;
  switch (name) {
    case 'serve':
      if (video !== undefined) throw new UsageError('serve takes no arguments');
      return { name: 'serve', configPath };
    case 'ingest':
      if (video === undefined) throw new UsageError('ingest needs a video URL or id');
      return {
        name: 'ingest',
        video,
        languages: languagesOf(values.lang),
        force: values.force ?? false,
        embeddingModel: values['embedding-model'],
        configPath
      };
    case 'ask':
      if (video === undefined) throw new UsageError('ask needs a video URL or id');
      return {
        name: 'ask',
        video,
        languages: languagesOf(values.lang),
        embeddingModel: values['embedding-model'],
        model: values.model,
        configPath
      };
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}
