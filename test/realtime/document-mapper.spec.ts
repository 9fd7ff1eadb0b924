/**
 * Unit tests for the document mapper (src/realtime/document-mapper.ts)
 */

import { expect } from 'chai';
import {
  DocumentMapper,
  isStoredDocument,
  toEntries,
} from '../../src/realtime/document-mapper';
import { MemoryDocumentStore } from '../../src/storage';
import { StoreRecord } from '../../src/types';
import { newStore } from '../_setup';

describe('realtime/document-mapper', () => {
  let store: MemoryDocumentStore;
  let mapper: DocumentMapper;

  beforeEach(() => {
    store = newStore();
    mapper = new DocumentMapper(store);
  });

  it('stores one flat record per document', async () => {
    await mapper.write('dinosaurs', 't-rex', [], { height: 12 }, 'replace');
    expect(await store.findAll('dinosaurs')).to.deep.equal([
      { _id: 't-rex', _fm_id: 't-rex', _fm_val: { height: 12 } },
    ]);
  });

  it('reads whole documents and nested values', async () => {
    await mapper.write(
      'dinosaurs',
      't-rex',
      [],
      { dimensions: { height: 12, weight: 8 } },
      'replace',
    );
    expect(await mapper.read('dinosaurs', 't-rex')).to.deep.equal({
      dimensions: { height: 12, weight: 8 },
    });
    expect(
      await mapper.read('dinosaurs', 't-rex', ['dimensions', 'height']),
    ).to.equal(12);
    expect(await mapper.read('dinosaurs', 't-rex', ['missing'])).to.equal(undefined);
    expect(await mapper.read('dinosaurs', 'raptor')).to.equal(undefined);
  });

  it('replaces the nested target and keeps its siblings', async () => {
    await mapper.write('c', 'd', [], { a: { x: 1, y: 2 }, b: 1 }, 'replace');
    await mapper.write('c', 'd', ['a'], { z: 3 }, 'replace');
    expect(await mapper.read('c', 'd')).to.deep.equal({ a: { z: 3 }, b: 1 });
  });

  it('merges into the nested target', async () => {
    await mapper.write('c', 'd', [], { a: { x: 1, y: 2 }, b: 1 }, 'replace');
    await mapper.write('c', 'd', ['a'], { y: null, z: 3 }, 'merge');
    expect(await mapper.read('c', 'd')).to.deep.equal({ a: { x: 1, z: 3 }, b: 1 });
  });

  it('creates a document when writing below a missing one', async () => {
    await mapper.write('c', 'd', ['a', 'b'], 1, 'replace');
    expect(await mapper.read('c', 'd')).to.deep.equal({ a: { b: 1 } });
  });

  it('plans a delete when a write empties the document', async () => {
    await mapper.write('c', 'd', [], 1, 'replace');
    expect(await mapper.planWrite('c', 'd', [], null, 'replace')).to.deep.equal([
      { type: 'delete', collection: 'c', key: 'd' },
    ]);
    expect(await mapper.planWrite('c', 'missing', [], null, 'replace')).to.deep.equal([]);
  });

  it('removes nested values and keeps the document', async () => {
    await mapper.write('c', 'd', [], { a: { b: 1 }, e: 2 }, 'replace');
    await mapper.remove('c', 'd', ['a', 'b']);
    expect(await mapper.read('c', 'd')).to.deep.equal({ a: {}, e: 2 });
  });

  it('removes whole documents and keeps the collection', async () => {
    await mapper.write('c', 'd', [], 1, 'replace');
    await mapper.remove('c', 'd', []);
    expect(await store.collectionExists('c')).to.equal(true);
    expect(await store.countRecords('c')).to.equal(0);
  });

  it('plans nothing when removing absent values', async () => {
    await mapper.write('c', 'd', [], { a: 1 }, 'replace');
    expect(await mapper.planRemove('c', 'd', ['b'])).to.deep.equal([]);
    expect(await mapper.planRemove('c', 'x', [])).to.deep.equal([]);
  });

  it('skips records that are not documents', () => {
    const records: StoreRecord[] = [
      { _id: 'a', _fm_id: 'a', _fm_val: 1 },
      { _id: '__fm_root__', __fm_root__: 5 },
    ];
    expect(records.map(isStoredDocument)).to.deep.equal([true, false]);
    expect(toEntries(records)).to.deep.equal([['a', 1]]);
  });
});
