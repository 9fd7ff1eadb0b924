/**
 * POST handler: store a value under a generated key
 */

import type { RealtimeServer } from '../server';
import {
  RealtimeCall,
  ReplyCallback,
  parseBody,
  parseWriteOptions,
} from './call';

export async function handlePostData(
  server: RealtimeServer,
  call: RealtimeCall,
  callback: ReplyCallback,
): Promise<void> {
  try {
    const value = parseBody(call);
    const name = await server.database.push(
      call.path,
      value,
      parseWriteOptions(call),
    );
    server.logger.log('http', `[PostData] path=${call.path} name=${name}`);
    callback(null, { status: 200, value: { name } });
  } catch (error: unknown) {
    callback(error);
  }
}
