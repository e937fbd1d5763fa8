import { describe, it, expect } from 'vitest';
import path from 'path';
import { MarkupFileSource, parseMarkupText } from '../../../src/lib/sources/markup-file.js';
import { columnNames, getColumn } from '../../../src/lib/dataset/index.js';
import { markupSourceSchema } from '../../../src/types/config.js';
import { SourceNotFoundError, SourceReadError } from '../../../src/utils/errors.js';

const RECORD_PATH = ['records', 'record'];

describe('parseMarkupText', () => {
  it('should build one column per child element in first-seen order', async () => {
    const dataset = await parseMarkupText(
      '<records><record><a>1</a><b>x</b></record><record><a>2</a><c>y</c></record></records>',
      RECORD_PATH,
    );

    expect(columnNames(dataset)).toEqual(['a', 'b', 'c']);
    expect(getColumn(dataset, 'b').values).toEqual(['x', '']);
    expect(getColumn(dataset, 'c').values).toEqual(['', 'y']);
  });

  it('should accept a single record', async () => {
    const dataset = await parseMarkupText('<records><record><a>1</a></record></records>', RECORD_PATH);
    expect(dataset.rowCount).toBe(1);
  });

  it('should convert numeric columns at ingestion', async () => {
    const dataset = await parseMarkupText(
      '<records><record><v>59.9</v></record><record><v></v></record></records>',
      RECORD_PATH,
      ['v'],
    );

    const column = getColumn(dataset, 'v');
    expect(column.kind).toBe('numeric');
    expect(column.values[0]).toBe(59.9);
    expect(Number.isNaN(column.values[1])).toBe(true);
  });

  it('should reject a non-numeric value in a numeric column', async () => {
    await expect(
      parseMarkupText('<records><record><v>abc</v></record></records>', RECORD_PATH, ['v']),
    ).rejects.toThrow('Non-numeric value "abc" in v (row 0)');
  });

  it('should reject malformed markup', async () => {
    await expect(parseMarkupText('<records><record>', RECORD_PATH)).rejects.toBeInstanceOf(
      SourceReadError,
    );
  });

  it('should reject a missing record path', async () => {
    await expect(parseMarkupText('<items><item/></items>', RECORD_PATH)).rejects.toThrow(
      'Element <records> not found in <inline>',
    );
  });
});

describe('MarkupFileSource', () => {
  it('should load the fixture file', async () => {
    const adapter = new MarkupFileSource(
      markupSourceSchema.parse({
        name: 'loja',
        kind: 'markup',
        path: path.resolve('tests/fixtures/usuarios.xml'),
        numericColumns: ['buy_value'],
      }),
    );

    const loaded = await adapter.load();

    expect(getColumn(loaded.users, 'name').values).toEqual(['Carla', 'Davi']);
    expect(getColumn(loaded.users, 'phone').values).toEqual(['+55 21 99876-5432', '']);
    expect(getColumn(loaded.users, 'buy_value')).toEqual({ kind: 'numeric', values: [59.9, 250] });
    expect(loaded.dependants).toBeUndefined();
  });

  it('should fail with SourceNotFoundError for a missing file', async () => {
    const adapter = new MarkupFileSource(
      markupSourceSchema.parse({ name: 'loja', kind: 'markup', path: 'tests/fixtures/nope.xml' }),
    );
    await expect(adapter.load()).rejects.toBeInstanceOf(SourceNotFoundError);
  });
});
