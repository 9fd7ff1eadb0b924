/**
 * Handlers of `/__fm_rules__[/{path}]`: index rules of a path
 */

import { ROOT_COLLECTION } from '../../types';
import type { RealtimeServer } from '../server';
import { RealtimeCall, ReplyCallback, parseBody } from './call';

/**
 * Rules of one path; at the bare rules path, every declared rule keyed by
 * path (the database root's under `__root__`)
 */
export async function handleGetRules(
  server: RealtimeServer,
  rulesPath: string,
  callback: ReplyCallback,
): Promise<void> {
  try {
    server.logger.log('http', `[GetRules] path=${rulesPath}`);
    if (rulesPath === ROOT_COLLECTION) {
      callback(null, { status: 200, value: await server.database.listRules() });
      return;
    }

    const rules = await server.database.getRules(rulesPath);
    callback(null, rules ? { status: 200, value: rules } : { status: 404 });
  } catch (error: unknown) {
    callback(error);
  }
}

export async function handlePutRules(
  server: RealtimeServer,
  rulesPath: string,
  call: RealtimeCall,
  callback: ReplyCallback,
): Promise<void> {
  try {
    const body = parseBody(call);
    const rules = await server.database.setRules(rulesPath, body);
    callback(null, { status: 200, value: rules });
  } catch (error: unknown) {
    callback(error);
  }
}

export async function handleDeleteRules(
  server: RealtimeServer,
  rulesPath: string,
  callback: ReplyCallback,
): Promise<void> {
  try {
    const deleted = await server.database.deleteRules(rulesPath);
    server.logger.log(
      'http',
      `[DeleteRules] path=${rulesPath}${deleted ? '' : ' (none declared)'}`,
    );
    callback(null, { status: 200, value: null });
  } catch (error: unknown) {
    callback(error);
  }
}
