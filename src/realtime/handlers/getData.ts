/**
 * GET handler: read or query
 */

import type { RealtimeServer } from '../server';
import { RealtimeCall, ReplyCallback, parseQueryOptions } from './call';

export async function handleGetData(
  server: RealtimeServer,
  call: RealtimeCall,
  callback: ReplyCallback,
): Promise<void> {
  try {
    const options = parseQueryOptions(call);
    server.logger.log(
      'http',
      `[GetData] path=${call.path} query=${JSON.stringify(options)}`,
    );

    const value = await server.database.get(call.path, options);
    if (value === undefined) {
      server.logger.log('http', `[GetData] ${call.path}: not found`);
      callback(null, { status: 404 });
      return;
    }
    callback(null, { status: 200, value });
  } catch (error: unknown) {
    callback(error);
  }
}
