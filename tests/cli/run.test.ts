import path from 'node:path';
import { runEnrichCli } from '../../src/cli/run';

const FIXTURES = path.join(__dirname, 'fixtures');
const fixture = (name: string) => path.join(FIXTURES, name);

describe('match-enrich run', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => { });
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  const printed = () => JSON.parse(logSpy.mock.calls[0][0]);

  it('enriches a document from a reference file', async () => {
    await runEnrichCli([
      'node', 'match-enrich', 'run',
      '--policy', 'users',
      '--match-field', 'email',
      '--field', 'contact',
      '--target-field', 'user',
      '--max-matches', '2',
      '--document', fixture('document.json'),
      '--reference', fixture('reference.json'),
    ]);

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(printed()).toStrictEqual({
      contact: 'alice@example.com',
      user: [
        { email: 'alice@example.com', name: 'Alice', team: 'core' },
        { email: 'alice@example.com', name: 'Alice (work)', team: 'sales' },
      ],
    });
  });

  it('reads the match field from a policies file and keeps existing targets with --no-override', async () => {
    await runEnrichCli([
      'node', 'match-enrich', 'run',
      '--policy', 'users',
      '--policies', fixture('policies.json'),
      '--field', 'contact',
      '--target-field', 'user',
      '--no-override',
      '--document', fixture('document.json'),
      '--reference', fixture('reference.json'),
    ]);

    expect(printed()).toStrictEqual({ contact: 'alice@example.com', user: 'unknown' });
  });

  it('passes documents without the key through with --ignore-missing', async () => {
    await runEnrichCli([
      'node', 'match-enrich', 'run',
      '--policy', 'users',
      '--match-field', 'email',
      '--field', 'email',
      '--target-field', 'user',
      '--ignore-missing',
      '--document', fixture('document.json'),
      '--reference', fixture('reference.json'),
    ]);

    expect(printed()).toStrictEqual({ contact: 'alice@example.com', user: 'unknown' });
  });

  it('fails documents without the key', async () => {
    await expect(runEnrichCli([
      'node', 'match-enrich', 'run',
      '--policy', 'users',
      '--match-field', 'email',
      '--field', 'email',
      '--target-field', 'user',
      '--document', fixture('document.json'),
      '--reference', fixture('reference.json'),
    ])).rejects.toThrow('field [email] not present as part of path [email]');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('requires a match field or a policies file', async () => {
    await expect(runEnrichCli([
      'node', 'match-enrich', 'run',
      '--policy', 'users',
      '--field', 'contact',
      '--target-field', 'user',
      '--document', fixture('document.json'),
      '--reference', fixture('reference.json'),
    ])).rejects.toThrow('Either --policies or --match-field is required.');
  });
});
