import { describe, expect, it } from 'vitest';
import { DuplicateNameError, SpectrumNotFoundError } from './errors.js';
import { SpectrumParser } from './parser/SpectrumParser.js';
import { SpectrumCollection } from './SpectrumCollection.js';

const parser = new SpectrumParser();
const rows = [
  ['500', '1'],
  ['501', '2'],
];

describe('SpectrumCollection', () => {
  it('keeps spectra in insertion order', () => {
    const collection = new SpectrumCollection();
    collection.add(parser.parse(rows, 'b.txt'));
    collection.add(parser.parse(rows, 'a.txt'));
    expect(collection.names()).toEqual(['b.txt', 'a.txt']);
    expect(collection.size).toBe(2);
  });

  it('rejects a second spectrum with the same display name', () => {
    const collection = new SpectrumCollection();
    collection.add(parser.parse(rows, 'one/run.txt'));
    expect(() => collection.add(parser.parse(rows, 'two/run.txt'))).toThrow(DuplicateNameError);
    expect(collection.get('run.txt')?.sourcePath).toBe('one/run.txt');
    expect(collection.size).toBe(1);
  });

  it('allows re-adding a name after removal', () => {
    const collection = new SpectrumCollection();
    collection.add(parser.parse(rows, 'run.txt'));
    const removed = collection.remove('run.txt');
    expect(removed.displayName).toBe('run.txt');
    expect(collection.has('run.txt')).toBe(false);
    collection.add(parser.parse(rows, 'run.txt'));
    expect(collection.names()).toEqual(['run.txt']);
  });

  it('throws when removing an unknown name', () => {
    const collection = new SpectrumCollection();
    expect(() => collection.remove('nope.txt')).toThrow(SpectrumNotFoundError);
    expect(() => collection.remove('nope.txt')).toThrow('Not found: spectrum nope.txt');
  });

  it('clears everything', () => {
    const collection = new SpectrumCollection();
    collection.add(parser.parse(rows, 'run.txt'));
    collection.clear();
    expect(collection.list()).toEqual([]);
  });
});
