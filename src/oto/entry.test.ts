import { describe, it, expect } from 'vitest';
import { defaultOtoEntry, formatOtoLine, getOtoField, isDefaultOtoEntry, parseOtoLine } from './entry.js';
import { mockLogger } from '../test-utils.js';

describe('parseOtoLine', () => {
  it('defaults an empty alias to the file stem and empty numbers to 0', () => {
    expect(parseOtoLine('a.wav=,100.0,200.0,,50.5,')).toEqual({
      file: 'a.wav',
      alias: 'a',
      offset: 100.0,
      fixed: 200.0,
      blank: 0.0,
      preutter: 50.5,
      overlap: 0.0,
    });
  });

  it('reads every field of a complete line', () => {
    expect(parseOtoLine('_ka.wav=- ka,12,80,-200,40,15')).toEqual({
      file: '_ka.wav',
      alias: '- ka',
      offset: 12,
      fixed: 80,
      blank: -200,
      preutter: 40,
      overlap: 15,
    });
  });

  it('treats missing trailing fields as 0', () => {
    expect(parseOtoLine('d.wav=d,10')).toMatchObject({ alias: 'd', offset: 10, fixed: 0, overlap: 0 });
  });

  it('accepts a line without =', () => {
    expect(parseOtoLine('e.wav')).toEqual({ ...defaultOtoEntry(), file: 'e.wav', alias: 'e' });
  });

  it('ignores a trailing carriage return', () => {
    expect(parseOtoLine('a.wav=a,1,2,3,4,5\r').overlap).toBe(5);
  });

  it('takes the stem of a file in a subdirectory', () => {
    expect(parseOtoLine('sub/ka.wav=,1,2,3,4,5').alias).toBe('ka');
  });

  it('accepts leading-dot decimals', () => {
    expect(parseOtoLine('a.wav=a,.5,1.,0,0,0')).toMatchObject({ offset: 0.5, fixed: 1 });
  });

  it('zeroes the whole group when one number is malformed and reports the line', () => {
    const logger = mockLogger();
    const entry = parseOtoLine('b.wav=b,1x,2,3,4,5', logger);
    expect(entry).toEqual({ file: 'b.wav', alias: 'b', offset: 0, fixed: 0, blank: 0, preutter: 0, overlap: 0 });
    expect(logger.warn).toHaveBeenCalledWith(
      'Malformed OTO numbers in "b.wav=b,1x,2,3,4,5"; using offset=0, fixed=0, blank=0, preutter=0, overlap=0',
    );
  });

  it('zeroes the group for numbers outside the plain decimal form', () => {
    for (const line of ['c.wav=c,1.2.3,0,0,0,0', 'c.wav=c,+5,0,0,0,0', 'c.wav=c,1e3,0,0,0,0']) {
      const logger = mockLogger();
      expect(parseOtoLine(line, logger)).toMatchObject({ offset: 0, fixed: 0 });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    }
  });

  it('keeps extra commas in the last field, which then fails to parse', () => {
    const logger = mockLogger();
    const entry = parseOtoLine('c.wav=c,1,2,3,4,5,6', logger);
    expect(entry).toMatchObject({ alias: 'c', offset: 0, overlap: 0 });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('does not report well-formed lines', () => {
    const logger = mockLogger();
    parseOtoLine('a.wav=a,1,2,3,4,5', logger);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe('formatOtoLine', () => {
  it('reproduces well-formed lines', () => {
    for (const line of ['_ka.wav=- ka,12,80,-200,40,15', 'a.wav=a,0,0,0,0,0', 'い.wav=a い,1.5,2.25,0,3,4']) {
      expect(formatOtoLine(parseOtoLine(line))).toBe(line);
    }
  });

  it('keeps field values through a parse of the formatted line', () => {
    const line = 'a.wav=,100.0,200.0,,50.5,';
    const entry = parseOtoLine(line);
    expect(formatOtoLine(entry)).toBe('a.wav=a,100,200,0,50.5,0');
    expect(parseOtoLine(formatOtoLine(entry))).toEqual(entry);
  });
});

describe('defaultOtoEntry', () => {
  it('is recognized by isDefaultOtoEntry', () => {
    expect(isDefaultOtoEntry(defaultOtoEntry())).toBe(true);
    expect(isDefaultOtoEntry(parseOtoLine('a.wav=a,0,0,0,0,0'))).toBe(false);
  });
});

describe('getOtoField', () => {
  it('reads a field by name', () => {
    const entry = parseOtoLine('a.wav=x,1,2,3,4,5');
    expect(getOtoField(entry, 'alias')).toBe('x');
    expect(getOtoField(entry, 'preutter')).toBe(4);
  });
});
