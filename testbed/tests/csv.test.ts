import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { appendCsv, parseCsv, parseCsvRecords, toCsv, toCsvLine } from '../csv';
import { tempDir } from './helpers';

interface Row {
  region: string;
  value: number | null;
}

describe('csv', () => {
  it('quotes fields with separators and quotes', () => {
    expect(toCsvLine(['plain', 'a,b', 'say "hi"', null, 3, true])).toBe('plain,"a,b","say ""hi""",,3,true');
  });

  it('writes a header and one line per row', () => {
    const rows: Row[] = [
      { region: 'us-east-1', value: 12.5 },
      { region: 'eu-west-2', value: null },
    ];
    expect(toCsv<Row>(['region', 'value'], rows)).toBe('region,value\nus-east-1,12.5\neu-west-2,\n');
  });

  it('parses quoted fields and CRLF line endings', () => {
    expect(parseCsv('a,b\r\n"x,y","q""r"\r\n')).toEqual([
      ['a', 'b'],
      ['x,y', 'q"r'],
    ]);
  });

  it('maps rows onto the header', () => {
    expect(parseCsvRecords('region,value\nus-east-1,12.5\neu-west-2\n')).toEqual([
      { region: 'us-east-1', value: '12.5' },
      { region: 'eu-west-2', value: '' },
    ]);
    expect(parseCsvRecords('')).toEqual([]);
  });

  it('writes the header only once when appending', async () => {
    const file = path.join(await tempDir(), 'nested', 'rows.csv');
    await appendCsv<Row>(file, ['region', 'value'], [{ region: 'us-east-1', value: 1 }]);
    await appendCsv<Row>(file, ['region', 'value'], [{ region: 'eu-west-2', value: 2 }]);

    expect(await fs.readFile(file, 'utf8')).toBe('region,value\nus-east-1,1\neu-west-2,2\n');
  });
});
