import { describe, expect, it } from 'vitest';
import { DegenerateDataError, FormatError } from '../errors.js';
import type { RawRow } from '../types.js';
import { SpectrumParser, displayNameOf, findDataStart, intensityRange } from './SpectrumParser.js';

const parser = new SpectrumParser();

const ABSORBANCE_ROWS: RawRow[] = [
  ['Sample X', 'Sample X'],
  ['Date', '12/03/2021'],
  ['Time', '10:15:30'],
  ['YUNITS', 'A'],
  ['400', '0.1'],
  ['401', '0.3'],
  ['402', '0.2'],
];

describe('SpectrumParser', () => {
  it('splits header and data and extracts labelled metadata', () => {
    const spectrum = parser.parse(ABSORBANCE_ROWS, 'exports/run1.txt', { delimiter: '\t' });

    expect(spectrum.displayName).toBe('run1.txt');
    expect(spectrum.sourcePath).toBe('exports/run1.txt');
    expect(spectrum.delimiter).toBe('\t');
    expect(spectrum.dataStart).toBe(4);
    expect(spectrum.title).toBe('Sample X');
    expect(spectrum.date).toBe('12.03.2021');
    expect(spectrum.time).toBe('10:15:30');
    expect(spectrum.modeCode).toBe('A');
    expect(spectrum.unitLabel).toEqual(['Extinction E', '', '']);
    expect(spectrum.wavelength).toEqual([400, 401, 402]);
    expect(spectrum.intensity).toEqual([0.1, 0.3, 0.2]);
    expect(spectrum.xMin).toBe(400);
    expect(spectrum.xMax).toBe(402);
    expect(spectrum.yMin).toBe(0.1);
    expect(spectrum.yMax).toBe(0.3);
    expect(spectrum.deltaX).toBe(1);
    expect(spectrum.metadataPairs).toEqual([
      ['Sample X', 'Sample X'],
      ['Date', '12/03/2021'],
      ['Time', '10:15:30'],
      ['YUNITS', 'A'],
    ]);
  });

  it('returns a frozen spectrum', () => {
    const spectrum = parser.parse(ABSORBANCE_ROWS, 'run1.txt');
    expect(Object.isFrozen(spectrum)).toBe(true);
    expect(Object.isFrozen(spectrum.intensity)).toBe(true);
  });

  it('uses the defaults when there is no header', () => {
    const spectrum = parser.parse(
      [
        ['500', '1'],
        ['501', '2'],
      ],
      'bare.txt',
    );
    expect(spectrum.dataStart).toBe(0);
    expect(spectrum.title).toBe('Unknown');
    expect(spectrum.date).toBe('Unknown');
    expect(spectrum.time).toBe('Unknown');
    expect(spectrum.modeCode).toBe('unknown units');
    expect(spectrum.unitLabel).toEqual(['', '', 'unknown units']);
    expect(spectrum.metadataPairs).toEqual([]);
  });

  it('falls back to date and time patterns in the first row', () => {
    const spectrum = parser.parse([['Report 01.02.2023 08:09:10'], ['500', '1']], 'report.txt');
    expect(spectrum.title).toBe('');
    expect(spectrum.date).toBe('01.02.2023');
    expect(spectrum.time).toBe('08:09:10');
    expect(spectrum.modeCode).toBe('');
    expect(spectrum.metadataPairs).toEqual([['Report 01.02.2023 08:09:10', '']]);
  });

  it('takes the mode from the row before the data when it is unlabelled', () => {
    const spectrum = parser.parse(
      [
        ['Sample', 'S1'],
        ['nm', '%T'],
        ['500', '80'],
      ],
      't.txt',
    );
    expect(spectrum.modeCode).toBe('%T');
    expect(spectrum.unitLabel).toEqual(['Transmission', ' in ', '%']);
  });

  it('turns unparsable intensities into NaN', () => {
    const spectrum = parser.parse(
      [
        ['1', 'x'],
        ['2', '5'],
      ],
      'gaps.txt',
    );
    expect(spectrum.intensity[0]).toBeNaN();
    expect(spectrum.intensity[1]).toBe(5);
    expect(spectrum.yMin).toBe(5);
    expect(spectrum.yMax).toBe(5);
  });

  it('fails on a non-numeric wavelength inside the data block', () => {
    expect(() =>
      parser.parse(
        [
          ['h', 'x'],
          ['1', '2'],
          ['abc', '3'],
        ],
        'broken.txt',
      ),
    ).toThrow('broken.txt, line 3: wavelength "abc" is not a number');
  });

  it('fails when there are no numeric rows', () => {
    expect(() => parser.parse([['a', 'b']], 'text.txt')).toThrow(FormatError);
  });

  it('keeps a degenerate spectrum unless asked to reject it', () => {
    const rows: RawRow[] = [
      ['1', 'x'],
      ['2', ''],
    ];
    const spectrum = parser.parse(rows, 'flat.txt');
    expect(spectrum.yMin).toBeUndefined();
    expect(spectrum.yMax).toBeUndefined();
    expect(() => intensityRange(spectrum)).toThrow(DegenerateDataError);
    expect(() => parser.parse(rows, 'flat.txt', { rejectDegenerate: true })).toThrow(
      'flat.txt contains no numeric intensity values',
    );
  });

  it('leaves deltaX undefined for a single point', () => {
    const spectrum = parser.parse([['500', '1']], 'one.txt');
    expect(spectrum.deltaX).toBeUndefined();
    expect(spectrum.xMin).toBe(500);
    expect(spectrum.xMax).toBe(500);
  });
});

describe('displayNameOf', () => {
  it('accepts both path separators', () => {
    expect(displayNameOf('C:\\data\\run1.txt')).toBe('run1.txt');
    expect(displayNameOf('/data/run2.txt')).toBe('run2.txt');
    expect(displayNameOf('run3.txt')).toBe('run3.txt');
  });
});

describe('findDataStart', () => {
  it('finds the first row starting with a number', () => {
    expect(findDataStart([['x'], ['1e2', 'y'], ['3']])).toBe(1);
    expect(findDataStart([['500nm', '1']])).toBe(-1);
  });
});
