/**
 * Unit tests for the PUT handler (handlers/putData.ts)
 */

import { expect } from 'chai';
import {
  InvalidPayloadError,
  RootConflictError,
} from '../../../src/realtime/errors';
import { handlePutData } from '../../../src/realtime/handlers/putData';
import { RealtimeServer } from '../../../src/realtime';
import { makeCall, newServer, outcomeOf } from '../../_setup';

describe('realtime PutData (unit)', () => {
  let server: RealtimeServer;

  beforeEach(() => {
    server = newServer();
  });

  it('writes the value and answers with it', async () => {
    const call = makeCall('/dinosaurs/t-rex', {}, '{"height":12}');
    const { error, reply } = await outcomeOf((callback) =>
      handlePutData(server, call, callback),
    );
    expect(error).to.equal(null);
    expect(reply).to.deep.equal({ status: 200, value: { height: 12 } });
    expect(await server.database.get('/dinosaurs/t-rex')).to.deep.equal({
      height: 12,
    });
  });

  it('removes the value on null', async () => {
    await server.database.set('/dinosaurs/t-rex', { height: 12 });
    const { reply } = await outcomeOf((callback) =>
      handlePutData(server, makeCall('/dinosaurs/t-rex', {}, 'null'), callback),
    );
    expect(reply).to.deep.equal({ status: 200, value: null });
    expect(await server.database.get('/dinosaurs/t-rex')).to.equal(undefined);
  });

  it('missing body: callback with InvalidPayloadError', async () => {
    const { error } = await outcomeOf((callback) =>
      handlePutData(server, makeCall('/dinosaurs/t-rex'), callback),
    );
    expect(error).to.be.instanceOf(InvalidPayloadError);
  });

  it('displaces documents only with promote=true', async () => {
    await server.database.set('/c/a', 1);

    const refused = await outcomeOf((callback) =>
      handlePutData(server, makeCall('/c', {}, '5'), callback),
    );
    expect(refused.error).to.be.instanceOf(RootConflictError);

    const promoted = await outcomeOf((callback) =>
      handlePutData(server, makeCall('/c', { promote: 'true' }, '5'), callback),
    );
    expect(promoted.reply).to.deep.equal({ status: 200, value: 5 });
    expect(await server.database.get('/c')).to.equal(5);
  });
});
