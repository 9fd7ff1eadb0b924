/**
 * DELETE handler
 */

import type { RealtimeServer } from '../server';
import { RealtimeCall, ReplyCallback } from './call';

export async function handleDeleteData(
  server: RealtimeServer,
  call: RealtimeCall,
  callback: ReplyCallback,
): Promise<void> {
  try {
    server.logger.log('http', `[DeleteData] path=${call.path}`);
    await server.database.remove(call.path);
    callback(null, { status: 200, value: null });
  } catch (error: unknown) {
    callback(error);
  }
}
