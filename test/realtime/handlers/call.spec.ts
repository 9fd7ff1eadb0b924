/**
 * Unit tests for call parsing and error replies (handlers/call.ts)
 */

import { expect } from 'chai';
import {
  InvalidPayloadError,
  InvalidQueryError,
  PartialApplicationError,
  RootConflictError,
} from '../../../src/realtime/errors';
import {
  parseBody,
  parseParam,
  parseQueryOptions,
  parseWriteOptions,
  toErrorReply,
} from '../../../src/realtime/handlers/call';
import { makeCall } from '../../_setup';

describe('realtime/handlers/call', () => {
  describe('parseParam', () => {
    it('parses JSON and falls back to the raw string', () => {
      expect(parseParam('"height"')).to.equal('height');
      expect(parseParam('4')).to.equal(4);
      expect(parseParam('true')).to.equal(true);
      expect(parseParam('null')).to.equal(null);
      expect(parseParam('height')).to.equal('height');
    });
  });

  describe('parseQueryOptions', () => {
    it('reads query parameters', () => {
      const call = makeCall('/dinosaurs', {
        orderBy: '"height"',
        startAt: '4',
        limitToFirst: '2',
        print: 'pretty',
      });
      expect(parseQueryOptions(call)).to.deep.equal({
        orderBy: 'height',
        startAt: 4,
        limitToFirst: 2,
        limitToLast: undefined,
      });
    });

    it('reads equalTo and endAt', () => {
      const call = makeCall('/dinosaurs', {
        orderBy: '$key',
        equalTo: '"t-rex"',
        endAt: 'z',
      });
      const options = parseQueryOptions(call);
      expect(options.equalTo).to.equal('t-rex');
      expect(options.endAt).to.equal('z');
    });

    it('keeps null bounds', () => {
      const range = parseQueryOptions(
        makeCall('/dinosaurs', { orderBy: '"height"', startAt: 'null', endAt: 'null' }),
      );
      expect(range.startAt).to.equal(null);
      expect(range.endAt).to.equal(null);
      const exact = parseQueryOptions(
        makeCall('/dinosaurs', { orderBy: '"height"', equalTo: 'null' }),
      );
      expect(exact.equalTo).to.equal(null);
    });

    it('rejects a non-string orderBy', () => {
      expect(() => parseQueryOptions(makeCall('/d', { orderBy: '4' }))).to.throw(
        InvalidQueryError,
        'orderBy must be a string',
      );
    });

    it('rejects limits that are not numbers', () => {
      expect(() =>
        parseQueryOptions(makeCall('/d', { orderBy: '$key', limitToLast: 'two' })),
      ).to.throw(InvalidQueryError, 'limitToLast must be a number');
    });
  });

  describe('parseWriteOptions', () => {
    it('reads promote', () => {
      expect(parseWriteOptions(makeCall('/c', { promote: 'true' }))).to.deep.equal({
        promote: true,
      });
      expect(parseWriteOptions(makeCall('/c'))).to.deep.equal({ promote: false });
    });
  });

  describe('parseBody', () => {
    it('parses any JSON value', () => {
      expect(parseBody(makeCall('/c', {}, '{"a":[1,2]}'))).to.deep.equal({ a: [1, 2] });
      expect(parseBody(makeCall('/c', {}, ' null '))).to.equal(null);
      expect(parseBody(makeCall('/c', {}, '"text"'))).to.equal('text');
    });

    it('rejects missing and invalid bodies', () => {
      expect(() => parseBody(makeCall('/c'))).to.throw(
        InvalidPayloadError,
        'Missing JSON body',
      );
      expect(() => parseBody(makeCall('/c', {}, '{"a":'))).to.throw(
        InvalidPayloadError,
        "Invalid data; couldn't parse JSON object, array, or value",
      );
    });
  });

  describe('toErrorReply', () => {
    it('answers realtime errors with their status and code', () => {
      const error = new RootConflictError('c');
      expect(toErrorReply(error)).to.deep.equal({
        status: 409,
        value: { error: { message: error.message, code: 'ROOT_CONFLICT' } },
      });
    });

    it('reports the progress of a partial application', () => {
      const error = new PartialApplicationError(1, 3, new Error('test-store-failure'));
      expect(toErrorReply(error)).to.deep.equal({
        status: 500,
        value: {
          error: {
            message:
              'Partial application: 1 of 3 store operations applied before failure (test-store-failure)',
            code: 'PARTIAL_APPLICATION',
          },
          partial: true,
          completedSteps: 1,
          totalSteps: 3,
        },
      });
    });

    it('answers anything else as an internal error', () => {
      expect(toErrorReply(new Error('boom'))).to.deep.equal({
        status: 500,
        value: { error: { message: 'boom', code: 'INTERNAL' } },
      });
      expect(toErrorReply('boom')).to.deep.equal({
        status: 500,
        value: { error: { message: 'boom', code: 'INTERNAL' } },
      });
    });
  });
});
