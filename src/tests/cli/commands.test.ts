import { parseCommand, UsageError } from '../../commands.js';

describe('parseCommand', () => {
  it('falls back to help', () => {
    expect(parseCommand([])).toEqual({ name: 'help' });
    expect(parseCommand(['help'])).toEqual({ name: 'help' });
    expect(parseCommand(['ingest', '-h'])).toEqual({ name: 'help' });
  });

  it('parses serve with a config path', () => {
    expect(parseCommand(['serve', '--config', 'custom.json'])).toEqual({ name: 'serve', configPath: 'custom.json' });
  });

  it('parses ingest options', () => {
    expect(
      parseCommand(['ingest', 'abcDEF12345', '--lang', 'en, fr', '--force', '--embedding-model', 'hashing-384'])
    ).toEqual({
      name: 'ingest',
      video: 'abcDEF12345',
      languages: ['en', 'fr'],
      force: true,
      embeddingModel: 'hashing-384'
    });
  });

  it('parses ask options', () => {
    expect(parseCommand(['ask', 'https://youtu.be/abcDEF12345', '--model', 'gpt-test'])).toEqual({
      name: 'ask',
      video: 'https://youtu.be/abcDEF12345',
      model: 'gpt-test'
    });
  });

  it.each([
    [['ingest'], 'ingest needs a video URL or id'],
    [['ask'], 'ask needs a video URL or id'],
    [['ask', 'abcDEF12345', 'extra'], 'Unexpected arguments: extra'],
    [['serve', 'abcDEF12345'], 'serve takes no arguments'],
    [['publish'], 'Unknown command: publish'],
    [['ingest', 'abcDEF12345', '--lang', ' , '], '--lang needs at least one language code'],
    [['ingest', 'abcDEF12345', '--lang', 'en,../../etc/passwd'], 'Invalid language code: ../../etc/passwd']
  ])('rejects %j', (argv, message) => {
    expect(() => parseCommand(argv)).toThrow(new UsageError(message));
  });

  it('rejects unknown flags', () => {
    expect(() => parseCommand(['serve', '--verbose'])).toThrow(UsageError);
  });
});
