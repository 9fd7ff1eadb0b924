/**
 * Unit tests for the DELETE handler (handlers/deleteData.ts)
 */

import { expect } from 'chai';
import { MalformedPathError } from '../../../src/realtime/errors';
import { handleDeleteData } from '../../../src/realtime/handlers/deleteData';
import { makeCall, newServer, outcomeOf } from '../../_setup';

describe('realtime DeleteData (unit)', () => {
  it('removes the value and answers null', async () => {
    const server = newServer();
    await server.database.set('/c/d', { a: 1, b: 2 });
    const { error, reply } = await outcomeOf((callback) =>
      handleDeleteData(server, makeCall('/c/d/a'), callback),
    );
    expect(error).to.equal(null);
    expect(reply).to.deep.equal({ status: 200, value: null });
    expect(await server.database.get('/c/d')).to.deep.equal({ b: 2 });
  });

  it('answers null for an absent value', async () => {
    const server = newServer();
    const { reply } = await outcomeOf((callback) =>
      handleDeleteData(server, makeCall('/missing'), callback),
    );
    expect(reply).to.deep.equal({ status: 200, value: null });
  });

  it('malformed path: callback with MalformedPathError', function (done) {
    handleDeleteData(newServer(), makeCall('/a//b'), (error, reply) => {
      try {
        expect(error).to.be.instanceOf(MalformedPathError);
        expect(reply).to.equal(undefined);
        done();
      } catch (e: unknown) {
        done(e);
      }
    });
  });
});
