/**
 * Unit tests for src/utils.ts: JSON tree addressing and editing.
 */

import { expect } from 'chai';
import {
  generatePushId,
  getIn,
  isJsonValue,
  mergeValue,
  parseJson,
  removeIn,
  setIn,
  stripNulls,
} from '../src/utils';
import './_setup';

describe('utils', () => {
  describe('parseJson', () => {
    it('parses JSON text', () => {
      expect(parseJson('{"a":[1,true,null]}')).to.deep.equal({
        a: [1, true, null],
      });
      expect(parseJson('"height"')).to.equal('height');
      expect(parseJson('4')).to.equal(4);
    });

    it('returns undefined for text that is not JSON', () => {
      expect(parseJson('height')).to.equal(undefined);
      expect(parseJson('{"a":')).to.equal(undefined);
    });
  });

  describe('isJsonValue', () => {
    it('rejects non-finite numbers and functions', () => {
      expect(isJsonValue(Number.NaN)).to.equal(false);
      expect(isJsonValue({ a: () => 1 })).to.equal(false);
      expect(isJsonValue({ a: [1, 'x', { b: null }] })).to.equal(true);
    });
  });

  describe('getIn', () => {
    it('reads nested keys', () => {
      expect(getIn({ a: { b: 1 } }, ['a', 'b'])).to.equal(1);
      expect(getIn({ a: { b: 1 } }, [])).to.deep.equal({ a: { b: 1 } });
    });

    it('descends arrays by index', () => {
      expect(getIn({ list: ['x', 'y'] }, ['list', '1'])).to.equal('y');
      expect(getIn({ list: ['x', 'y'] }, ['list', '2'])).to.equal(undefined);
    });

    it('returns undefined when a scalar is in the way', () => {
      expect(getIn({ a: 5 }, ['a', 'b'])).to.equal(undefined);
      expect(getIn(undefined, ['a'])).to.equal(undefined);
    });
  });

  describe('stripNulls', () => {
    it('drops null members at every depth and keeps empty objects', () => {
      expect(stripNulls({ a: null, b: { c: null, d: 1 }, e: {} })).to.deep.equal(
        { b: { d: 1 }, e: {} },
      );
    });

    it('turns a bare null into undefined', () => {
      expect(stripNulls(null)).to.equal(undefined);
    });
  });

  describe('mergeValue', () => {
    it('replaces mentioned keys and keeps the others', () => {
      expect(mergeValue({ a: 1, b: { x: 1 } }, { b: { y: 2 }, c: 3 })).to.deep.equal(
        { a: 1, b: { y: 2 }, c: 3 },
      );
    });

    it('removes keys patched with null', () => {
      expect(mergeValue({ a: 1, b: 2 }, { a: null })).to.deep.equal({ b: 2 });
    });

    it('replaces a scalar target', () => {
      expect(mergeValue(5, { a: 1 })).to.deep.equal({ a: 1 });
    });
  });

  describe('setIn', () => {
    it('creates intermediate objects', () => {
      expect(setIn({ a: 1 }, ['b', 'c'], 2, 'replace')).to.deep.equal({
        a: 1,
        b: { c: 2 },
      });
    });

    it('replaces a scalar in the way', () => {
      expect(setIn({ a: 1 }, ['a', 'c'], 2, 'replace')).to.deep.equal({
        a: { c: 2 },
      });
    });

    it('merges at the target in merge mode', () => {
      expect(
        setIn({ a: { x: 1, y: 2 } }, ['a'], { y: 3 }, 'merge'),
      ).to.deep.equal({ a: { x: 1, y: 3 } });
    });

    it('removes the target when writing null', () => {
      expect(setIn({ a: 1, b: 2 }, ['a'], null, 'replace')).to.deep.equal({
        b: 2,
      });
      expect(setIn(7, [], null, 'replace')).to.equal(undefined);
    });

    it('converts an array written below into an index-keyed object', () => {
      expect(setIn({ l: ['x', 'y'] }, ['l', '1'], 'z', 'replace')).to.deep.equal(
        { l: { 0: 'x', 1: 'z' } },
      );
    });
  });

  describe('removeIn', () => {
    it('removes the addressed key and keeps emptied parents', () => {
      expect(removeIn({ a: { b: 1 } }, ['a', 'b'])).to.deep.equal({
        value: { a: {} },
        removed: true,
      });
    });

    it('reports absent targets', () => {
      expect(removeIn({ a: 1 }, ['b'])).to.deep.equal({
        value: { a: 1 },
        removed: false,
      });
    });
  });

  describe('generatePushId', () => {
    it('generates 20 character ids', () => {
      expect(generatePushId()).to.have.length(20);
    });

    it('orders ids by creation time', () => {
      const first = generatePushId(1_700_000_000_000);
      const second = generatePushId(1_700_000_000_001);
      expect(first < second).to.equal(true);
    });

    it('orders ids created in the same millisecond', () => {
      const first = generatePushId(1_700_000_000_500);
      const second = generatePushId(1_700_000_000_500);
      expect(first).to.not.equal(second);
      expect(first < second).to.equal(true);
    });
  });
});
