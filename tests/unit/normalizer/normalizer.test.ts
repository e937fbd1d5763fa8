import { describe, it, expect } from 'vitest';
import {
  normalize,
  normalizeDependants,
  normalizeUsers,
} from '../../../src/lib/normalizer/index.js';
import { columnNames, createDataset, datasetFromRows, recordAt } from '../../../src/lib/dataset/index.js';
import { ConversionError, PhoneFormatError } from '../../../src/utils/errors.js';

const userHeader = ['id', 'nome', 'email', 'telefone', 'valor_total'];

describe('normalizeUsers', () => {
  it('should apply phone, discount and money rules', () => {
    const users = datasetFromRows(
      [...userHeader, 'desconto'],
      [['1', 'Ana', 'a@x.com', '16981773421', '100,00', '10']],
    );

    const result = normalizeUsers(users);

    expect(columnNames(result)).toEqual(['id', 'nome', 'email', 'telefone', 'valor_total', 'valor_com_desconto']);
    expect(recordAt(result, 0)).toEqual({
      id: '1',
      nome: 'Ana',
      email: 'a@x.com',
      telefone: '+5516981773421',
      valor_total: '100,00',
      valor_com_desconto: '90,00',
    });
  });

  it('should reject a total written with comma grouping and a dot decimal', () => {
    const users = datasetFromRows(
      [...userHeader, 'desconto'],
      [['1', 'Ana', 'a@x.com', '16981773421', '1,234.56', '10']],
    );

    expect(() => normalizeUsers(users)).toThrow(
      new ConversionError('valor_total', '1,234.56', 0),
    );
  });

  it('should copy valor_total when there is no discount column', () => {
    const users = createDataset([
      ['id', { kind: 'numeric', values: [1, 2] }],
      ['nome', { kind: 'text', values: ['Ana', 'Bia'] }],
      ['email', { kind: 'text', values: ['a@x.com', 'b@x.com'] }],
      ['telefone', { kind: 'text', values: ['', '(11) 3456-7890'] }],
      ['valor_total', { kind: 'numeric', values: [100.5, 7] }],
    ]);

    const result = normalizeUsers(users);

    expect(columnNames(result)).toEqual([...userHeader, 'valor_com_desconto']);
    expect(result.columns.get('valor_total')).toEqual({ kind: 'text', values: ['100,50', '7,00'] });
    expect(result.columns.get('valor_com_desconto')).toEqual({ kind: 'text', values: ['100,50', '7,00'] });
    expect(result.columns.get('telefone')).toEqual({ kind: 'text', values: ['', '+551134567890'] });
    expect(result.columns.get('id')).toEqual({ kind: 'numeric', values: [1, 2] });
  });

  it('should read "-" as no discount and strip the currency marker', () => {
    const users = datasetFromRows(
      [...userHeader, 'desconto'],
      [
        ['1', 'Ana', '', '', 'R$ 59,90', '-'],
        ['2', 'Bia', '', '', 'R$ 200,00', '25'],
      ],
    );

    const result = normalizeUsers(users);

    expect(result.columns.get('valor_total')).toEqual({ kind: 'text', values: ['59,90', '200,00'] });
    expect(result.columns.get('valor_com_desconto')).toEqual({ kind: 'text', values: ['59,90', '150,00'] });
  });

  it('should keep blank totals blank', () => {
    const users = datasetFromRows([...userHeader, 'desconto'], [['1', 'Ana', '', '', '', '10']]);
    const record = recordAt(normalizeUsers(users), 0);
    expect(record.valor_total).toBe('');
    expect(record.valor_com_desconto).toBe('');
  });

  it('should replace the discount column in place', () => {
    const users = datasetFromRows(
      ['id', 'desconto', 'nome', 'email', 'telefone', 'valor_total'],
      [['1', '50', 'Ana', '', '', '10']],
    );
    expect(columnNames(normalizeUsers(users))).toEqual([
      'id',
      'valor_com_desconto',
      'nome',
      'email',
      'telefone',
      'valor_total',
    ]);
  });

  it('should abort on the first invalid phone number', () => {
    const users = datasetFromRows(userHeader, [['1', 'Ana', '', 'abc', '1']]);
    expect(() => normalizeUsers(users)).toThrow(PhoneFormatError);
  });

  it('should propagate conversion failures', () => {
    const users = datasetFromRows(userHeader, [['1', 'Ana', '', '', 'free']]);
    expect(() => normalizeUsers(users)).toThrow(ConversionError);
  });

  it('should not modify its input', () => {
    const users = datasetFromRows(userHeader, [['1', 'Ana', '', '16981773421', '1']]);
    normalizeUsers(users);
    expect(users.columns.get('telefone')).toEqual({ kind: 'text', values: ['16981773421'] });
    expect(columnNames(users)).toEqual(userHeader);
  });
});

describe('normalizeDependants', () => {
  it('should canonicalize data_hora and blank what it cannot read', () => {
    const dependants = datasetFromRows(
      ['id', 'usuario_id', 'dependente_de_id', 'data_hora'],
      [
        ['10', '1', '1', '2020-03-01T10:00:00'],
        ['11', '1', '1', 'amanhã'],
        ['12', '2', '2', ''],
      ],
    );

    const result = normalizeDependants(dependants);

    expect(result.columns.get('data_hora')).toEqual({
      kind: 'text',
      values: ['2020-03-01 10:00:00', '', ''],
    });
    expect(result.rowCount).toBe(3);
  });

  it('should honour dayFirst', () => {
    const dependants = datasetFromRows(['id', 'usuario_id', 'dependente_de_id', 'data_hora'], [['1', '1', '1', '02/03/2021']]);
    expect(recordAt(normalizeDependants(dependants, { dayFirst: true }), 0).data_hora).toBe('2021-03-02 00:00:00');
  });
});

describe('normalize', () => {
  it('should leave dependants absent when there are none', () => {
    const users = datasetFromRows(userHeader, [['1', 'Ana', '', '', '1']]);
    expect(normalize({ users }).dependants).toBeUndefined();
  });
});
