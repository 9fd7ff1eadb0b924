/**
 * PUT handler: replace the value at a path
 */

import type { RealtimeServer } from '../server';
import {
  RealtimeCall,
  ReplyCallback,
  parseBody,
  parseWriteOptions,
} from './call';

export async function handlePutData(
  server: RealtimeServer,
  call: RealtimeCall,
  callback: ReplyCallback,
): Promise<void> {
  try {
    const value = parseBody(call);
    const options = parseWriteOptions(call);
    server.logger.log(
      'http',
      `[PutData] path=${call.path}${options.promote ? ' (promote)' : ''}`,
    );

    await server.database.set(call.path, value, options);
    // Firebase answers a write with the data written
    callback(null, { status: 200, value });
  } catch (error: unknown) {
    callback(error);
  }
}
