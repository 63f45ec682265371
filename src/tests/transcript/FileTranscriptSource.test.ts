import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';

import { FileTranscriptSource } from '../../transcript/index.js';
import { TranscriptUnavailable } from '../../utils/errors.js';

describe('FileTranscriptSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tqa-transcripts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads timed segments from JSON', async () => {
    await writeFile(
      join(dir, 'vid.en.json'),
      JSON.stringify([{ text: 'Hello', start: 0.5, duration: 1.25 }, { text: 'world' }]),
      'utf-8'
    );

    await expect(new FileTranscriptSource(dir).fetch('vid', 'en')).resolves.toEqual([
      { text: 'Hello', start: 0.5, duration: 1.25 },
      { text: 'world', start: 0, duration: 0 }
    ]);
  });

  it('reads plain text one segment per non-empty line', async () => {
    await writeFile(join(dir, 'vid.fr.txt'), 'Bonjour\r\n\n  tout le monde  \n', 'utf-8');

    await expect(new FileTranscriptSource(dir).fetch('vid', 'fr')).resolves.toEqual([
      { text: 'Bonjour', start: 0, duration: 0 },
      { text: 'tout le monde', start: 0, duration: 0 }
    ]);
  });

  it('prefers JSON over text', async () => {
    await writeFile(join(dir, 'vid.en.json'), JSON.stringify([{ text: 'from json' }]), 'utf-8');
    await writeFile(join(dir, 'vid.en.txt'), 'from text', 'utf-8');

    const segments = await new FileTranscriptSource(dir).fetch('vid', 'en');
    expect(segments.map((s) => s.text)).toEqual(['from json']);
  });

  it('fails when no file exists for the language', async () => {
    const source = new FileTranscriptSource(dir);
    await expect(source.fetch('vid', 'de')).rejects.toThrow(`No de transcript for vid in ${dir}`);
  });

  it('refuses languages that resolve outside the directory', async () => {
    const outside = await mkdtemp(join(tmpdir(), 'tqa-outside-'));
    await writeFile(join(outside, 'creds.txt'), 'not a transcript', 'utf-8');
    const source = new FileTranscriptSource(dir);

    try {
      await expect(source.fetch('vid', `/../../${basename(outside)}/creds`)).rejects.toThrow(
        `Refusing to read a transcript outside ${dir}`
      );
      await expect(source.fetch('vid', '../x')).rejects.toBeInstanceOf(TranscriptUnavailable);
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });

  it('fails on malformed or invalid JSON', async () => {
    await writeFile(join(dir, 'a.en.json'), '{oops', 'utf-8');
    await writeFile(join(dir, 'b.en.json'), JSON.stringify([{ start: 1 }]), 'utf-8');
    const source = new FileTranscriptSource(dir);

    await expect(source.fetch('a', 'en')).rejects.toThrow('Malformed en transcript for a');
    await expect(source.fetch('b', 'en')).rejects.toBeInstanceOf(TranscriptUnavailable);
  });
});
