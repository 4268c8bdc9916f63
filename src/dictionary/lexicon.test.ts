import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../core/errors';
import { Lexicon, lexiconFromText, loadLexicon } from './lexicon';

describe('Lexicon', () => {
  it('answers exact membership only', () => {
    const lexicon = new Lexicon(['foo', 'bar']);

    expect(lexicon.contains('foo')).toBe(true);
    expect(lexicon.contains('FOO')).toBe(true);
    expect(lexicon.contains(' Bar ')).toBe(true);
    expect(lexicon.contains('baz')).toBe(false);
    expect(lexicon.contains('fo')).toBe(false);
    expect(lexicon.contains('food')).toBe(false);
    expect(lexicon.contains('')).toBe(false);
  });

  it('ignores empty input and duplicates', () => {
    const lexicon = new Lexicon();
    lexicon.add('');
    lexicon.add('   ');
    lexicon.add('cat');
    lexicon.add('CAT');

    expect(lexicon.size).toBe(1);
    expect(lexicon.words()).toEqual(['CAT']);
  });

  it('lists words in alphabetical order', () => {
    const lexicon = new Lexicon(['foo', 'bar', 'baz', 'ba']);
    expect(lexicon.words()).toEqual(['BA', 'BAR', 'BAZ', 'FOO']);
  });

  it('exposes prefix nodes', () => {
    const lexicon = new Lexicon(['bar', 'baz']);

    expect(lexicon.hasPrefix('ba')).toBe(true);
    expect(lexicon.hasPrefix('x')).toBe(false);
    expect([...(lexicon.node('BA')?.children.keys() ?? [])].sort()).toEqual(['R', 'Z']);
    expect(lexicon.node('BA')?.end).toBe(false);
    expect(lexicon.node('BAR')?.end).toBe(true);
    expect(lexicon.node('X')).toBeNull();
  });
});

describe('lexiconFromText', () => {
  it('takes the first field of each line and keeps letters-only words', () => {
    const lexicon = lexiconFromText('cat 120\nDog\n\n  zebra  \ncan\'t\nr2d2\n');
    expect(lexicon.words()).toEqual(['CAT', 'DOG', 'ZEBRA']);
  });
});

describe('loadLexicon', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lexicon-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a word list file', async () => {
    const path = join(dir, 'words.txt');
    await writeFile(path, 'cat\ndog\n', 'utf8');

    const lexicon = await loadLexicon(path);
    expect(lexicon.size).toBe(2);
    expect(lexicon.contains('DOG')).toBe(true);
  });

  it('fails with a ConfigurationError on a missing file', async () => {
    await expect(loadLexicon(join(dir, 'missing.txt'))).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('fails with a ConfigurationError on a file without words', async () => {
    const path = join(dir, 'empty.txt');
    await writeFile(path, '123\n\n', 'utf8');
    await expect(loadLexicon(path)).rejects.toThrow('contains no usable words');
  });
});
