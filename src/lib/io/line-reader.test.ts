import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Chunk, Effect, Stream } from 'effect';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runFailure } from '@tests/utils/effect-helpers';
import { cleanLine, readTextFile, splitLines, streamLines } from './line-reader';
import { joinLines, writeLines } from './file-writer';

describe('cleanLine', () => {
  it('should strip a carriage return and leading whitespace', () => {
    expect(cleanLine('  \tname=value \r')).toBe('name=value ');
  });
});

describe('splitLines', () => {
  it('should drop blank and comment lines and keep source numbers', () => {
    const lines = splitLines('#a\n\n// note\n  name=x\r\n', {
      commentIndicator: '//',
    });
    expect(lines).toEqual([
      { text: '#a', number: 1 },
      { text: 'name=x', number: 4 },
    ]);
  });

  it('should keep comment-like lines when no indicator is set', () => {
    expect(splitLines('// note').map((line) => line.text)).toEqual([
      '// note',
    ]);
  });
});

describe('joinLines', () => {
  it('should terminate every line', () => {
    expect(joinLines(['#a', 'x=1'])).toBe('#a\nx=1\n');
  });
});

describe('file lines', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'line-reader-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should stream the kept lines of a written file', async () => {
    const file = path.join(dir, 'objects.txt');
    await Effect.runPromise(writeLines(file, ['#a', '', '  name=first', '; skip']));

    const lines = await Effect.runPromise(
      Stream.runCollect(streamLines(file, { commentIndicator: ';' }))
    );
    expect(Chunk.toReadonlyArray(lines)).toEqual([
      { text: '#a', number: 1 },
      { text: 'name=first', number: 3 },
    ]);
  });

  it('should read a whole file', async () => {
    const file = path.join(dir, 'whole.txt');
    await fs.writeFile(file, 'content', 'utf8');
    expect(await Effect.runPromise(readTextFile(file))).toBe('content');
  });

  it('should report a missing file as FileNotFoundError', async () => {
    const missing = path.join(dir, 'missing.txt');

    const streamed = await runFailure(Stream.runDrain(streamLines(missing)));
    expect(streamed).toMatchObject({
      _tag: 'FileNotFoundError',
      path: missing,
      message: `File not found: ${missing}`,
    });

    const read = await runFailure(readTextFile(missing));
    expect(read._tag).toBe('FileNotFoundError');
  });
});
