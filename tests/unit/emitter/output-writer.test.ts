import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, readdir, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { Writable } from 'stream';
import { emitResult, renderDataset } from '../../../src/lib/emitter/output-writer.js';
import { RecordExporter } from '../../../src/lib/exporter/index.js';
import { datasetFromRows } from '../../../src/lib/dataset/index.js';
import type { MigrationResult } from '../../../src/lib/pipeline/index.js';

function makeResult(withDependants: boolean): MigrationResult {
  return {
    source: 'clientes',
    kind: 'delimited',
    users: new RecordExporter(datasetFromRows(['id', 'nome'], [['1', 'Ana']])),
    dependants: new RecordExporter(
      withDependants ? datasetFromRows(['id', 'data_hora'], [['9', '2020-03-01 10:00:00']]) : undefined,
    ),
    durationMs: 5,
  };
}

describe('renderDataset', () => {
  const exporter = new RecordExporter(datasetFromRows(['id', 'nome'], [['1', 'Ana'], ['2', 'Bia']]));

  it('should render csv', () => {
    expect(renderDataset(exporter, 'csv')).toBe('id,nome\n1,Ana\n2,Bia\n');
  });

  it('should render json', () => {
    expect(JSON.parse(renderDataset(exporter, 'json'))).toEqual([
      { id: '1', nome: 'Ana' },
      { id: '2', nome: 'Bia' },
    ]);
  });

  it('should render ndjson', () => {
    expect(renderDataset(exporter, 'ndjson')).toBe('{"id":"1","nome":"Ana"}\n{"id":"2","nome":"Bia"}\n');
  });
});

describe('emitResult', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'recordshift-out-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write one file per present dataset', async () => {
    const emitted = await emitResult(makeResult(true), { format: 'csv', dir });

    expect(emitted.map((file) => path.basename(file.path))).toEqual([
      'clientes.usuarios.csv',
      'clientes.dependentes.csv',
    ]);
    expect(await readFile(path.join(dir, 'clientes.usuarios.csv'), 'utf8')).toBe('id,nome\n1,Ana\n');
    expect(await readFile(path.join(dir, 'clientes.dependentes.csv'), 'utf8')).toBe(
      'id,data_hora\n9,2020-03-01 10:00:00\n',
    );
  });

  it('should skip the dependants file when there are no dependants', async () => {
    await emitResult(makeResult(false), { format: 'ndjson', dir });
    expect(await readdir(dir)).toEqual(['clientes.usuarios.ndjson']);
    expect(await readFile(path.join(dir, 'clientes.usuarios.ndjson'), 'utf8')).toBe('{"id":"1","nome":"Ana"}\n');
  });

  it('should fail with FileIOError when the output directory cannot be created', async () => {
    const blocker = path.join(dir, 'taken');
    await writeFile(blocker, 'not a directory');

    await expect(emitResult(makeResult(false), { format: 'csv', dir: blocker })).rejects.toThrow(
      `Failed to create output directory: ${blocker}`,
    );
  });

  it('should print both datasets to the stream without a directory', async () => {
    let text = '';
    const out = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        text += chunk.toString();
        callback();
      },
    });

    const emitted = await emitResult(makeResult(false), { format: 'csv' }, out);

    expect(emitted).toEqual([]);
    expect(text).toBe(
      `${'='.repeat(40)}\n\nSource: clientes (delimited)\n\nid,nome\n1,Ana\n\n${'-'.repeat(40)}\n\n`,
    );
  });
});
