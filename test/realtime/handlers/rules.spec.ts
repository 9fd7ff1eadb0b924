/**
 * Unit tests for the rules handlers (handlers/rules.ts)
 */

import { expect } from 'chai';
import { InvalidIndexError } from '../../../src/realtime/errors';
import {
  handleDeleteRules,
  handleGetRules,
  handlePutRules,
} from '../../../src/realtime/handlers/rules';
import { RealtimeServer } from '../../../src/realtime';
import { makeCall, newServer, outcomeOf } from '../../_setup';

describe('realtime rules handlers (unit)', () => {
  let server: RealtimeServer;

  beforeEach(() => {
    server = newServer();
  });

  it('PUT stores the rules and answers in rules form', async () => {
    const call = makeCall('/__fm_rules__/dinosaurs', {}, '{".indexOn":"height"}');
    const { error, reply } = await outcomeOf((callback) =>
      handlePutRules(server, 'dinosaurs', call, callback),
    );
    expect(error).to.equal(null);
    expect(reply).to.deep.equal({
      status: 200,
      value: { '.indexOn': ['height'] },
    });
  });

  it('PUT with a malformed body: callback with InvalidIndexError', async () => {
    const call = makeCall('/__fm_rules__/dinosaurs', {}, '{".indexOn":5}');
    const { error } = await outcomeOf((callback) =>
      handlePutRules(server, 'dinosaurs', call, callback),
    );
    expect(error).to.be.instanceOf(InvalidIndexError);
  });

  it('GET answers the rules of a path, or 404', async () => {
    await server.database.setRules('dinosaurs', { '.indexOn': ['height'] });

    const found = await outcomeOf((callback) =>
      handleGetRules(server, 'dinosaurs', callback),
    );
    expect(found.reply).to.deep.equal({
      status: 200,
      value: { '.indexOn': ['height'] },
    });

    const missing = await outcomeOf((callback) =>
      handleGetRules(server, 'birds', callback),
    );
    expect(missing.reply).to.deep.equal({ status: 404 });
  });

  it('GET at the bare rules path lists every rule', async () => {
    await server.database.setRules('dinosaurs', { '.indexOn': ['height'] });
    await server.database.setRules('scores', { '.indexOn': '.value' });
    const { reply } = await outcomeOf((callback) =>
      handleGetRules(server, '__root__', callback),
    );
    expect(reply).to.deep.equal({
      status: 200,
      value: {
        dinosaurs: { '.indexOn': ['height'] },
        scores: { '.indexOn': '.value' },
      },
    });
  });

  it('DELETE removes the rules and answers null', async () => {
    await server.database.setRules('dinosaurs', { '.indexOn': ['height'] });
    const { reply } = await outcomeOf((callback) =>
      handleDeleteRules(server, 'dinosaurs', callback),
    );
    expect(reply).to.deep.equal({ status: 200, value: null });
    expect(await server.database.getRules('dinosaurs')).to.equal(undefined);
  });
});
