/**
 * Unit tests for the rules/index manager (src/realtime/rules.ts)
 */

import { expect } from 'chai';
import { InvalidIndexError } from '../../src/realtime/errors';
import {
  RulesManager,
  parseIndexSpec,
  toRulesBody,
} from '../../src/realtime/rules';
import { MemoryDocumentStore } from '../../src/storage';
import { JsonValue } from '../../src/types';
import { newStore } from '../_setup';

describe('realtime/rules', () => {
  describe('parseIndexSpec', () => {
    it('reads the rules form', () => {
      expect(parseIndexSpec({ '.indexOn': 'height' })).to.deep.equal({
        fieldNames: ['height'],
      });
      expect(parseIndexSpec({ '.indexOn': ['height', 'weight', 'height'] })).to.deep.equal({
        fieldNames: ['height', 'weight'],
      });
      expect(parseIndexSpec({ '.indexOn': '.value' })).to.deep.equal({
        byValue: true,
      });
      expect(parseIndexSpec({ '.indexOn': ['.value'] })).to.deep.equal({
        byValue: true,
      });
    });

    it('reads the IndexSpec form', () => {
      expect(parseIndexSpec({ fieldNames: ['dimensions/height'] })).to.deep.equal({
        fieldNames: ['dimensions/height'],
      });
      expect(parseIndexSpec({ byValue: true })).to.deep.equal({ byValue: true });
    });

    it('rejects malformed specs', () => {
      const invalid: JsonValue[] = [
        'height',
        { '.indexOn': [] },
        { '.indexOn': [1] },
        { '.indexOn': ['.value', 'height'] },
        { '.indexOn': ['a.b'] },
        { '.indexOn': ['a//b'] },
        { '.indexOn': 5 },
        { '.read': true },
        { '.indexOn': 'height', '.read': true },
        { fieldNames: ['.value'] },
        { byValue: false },
      ];
      for (const body of invalid) {
        expect(() => parseIndexSpec(body), JSON.stringify(body)).to.throw(
          InvalidIndexError,
        );
      }
    });
  });

  describe('toRulesBody', () => {
    it('writes the rules form', () => {
      expect(toRulesBody({ byValue: true })).to.deep.equal({ '.indexOn': '.value' });
      expect(toRulesBody({ fieldNames: ['a', 'b'] })).to.deep.equal({
        '.indexOn': ['a', 'b'],
      });
    });
  });

  describe('RulesManager', () => {
    let store: MemoryDocumentStore;
    let rules: RulesManager;

    beforeEach(() => {
      store = newStore();
      rules = new RulesManager(store);
    });

    it('stores rules in the reserved rules collection', async () => {
      await rules.setRules('dinosaurs', { fieldNames: ['height'] });
      expect(await store.findByKey('__fm_rules__', 'dinosaurs')).to.deep.equal({
        _id: 'dinosaurs',
        path: 'dinosaurs',
        indexOn: { fieldNames: ['height'] },
      });
      expect(await rules.getIndexFor('dinosaurs')).to.deep.equal({
        fieldNames: ['height'],
      });
      expect(await rules.getIndexFor('birds')).to.equal(undefined);
    });

    it('replaces the rules of a path', async () => {
      await rules.setRules('dinosaurs', { fieldNames: ['height'] });
      await rules.setRules('dinosaurs', { byValue: true });
      expect(await rules.getIndexFor('dinosaurs')).to.deep.equal({ byValue: true });
    });

    it('creates store indexes for collection rules only', async () => {
      await rules.setRules('dinosaurs', { fieldNames: ['height', 'dimensions/weight'] });
      await rules.setRules('scores', { byValue: true });
      await rules.setRules('a/b', { fieldNames: ['c'] });
      expect(store.listIndexes('dinosaurs')).to.deep.equal([
        'height',
        'dimensions/weight',
      ]);
      expect(store.listIndexes('scores')).to.deep.equal(['']);
      expect(store.listIndexes('a')).to.deep.equal([]);
    });

    it('deletes rules', async () => {
      await rules.setRules('dinosaurs', { fieldNames: ['height'] });
      expect(await rules.deleteRules('dinosaurs')).to.equal(true);
      expect(await rules.deleteRules('dinosaurs')).to.equal(false);
      expect(await rules.getIndexFor('dinosaurs')).to.equal(undefined);
    });

    it('lists rules by path', async () => {
      await rules.setRules('scores', { byValue: true });
      await rules.setRules('dinosaurs', { fieldNames: ['height'] });
      expect(await rules.listRules()).to.deep.equal([
        ['dinosaurs', { fieldNames: ['height'] }],
        ['scores', { byValue: true }],
      ]);
    });

    it('ignores malformed stored rules', async () => {
      await store.apply({
        type: 'put',
        collection: '__fm_rules__',
        record: { _id: 'broken', path: 'broken', indexOn: 'height' },
      });
      expect(await rules.getIndexFor('broken')).to.equal(undefined);
      expect(await rules.listRules()).to.deep.equal([]);
    });
  });
});
