/**
 * PATCH handler: merge-patch an object into the value at a path
 */

import type { RealtimeServer } from '../server';
import {
  RealtimeCall,
  ReplyCallback,
  parseBody,
  parseWriteOptions,
} from './call';

export async function handlePatchData(
  server: RealtimeServer,
  call: RealtimeCall,
  callback: ReplyCallback,
): Promise<void> {
  try {
    const patch = parseBody(call);
    server.logger.log('http', `[PatchData] path=${call.path}`);

    await server.database.update(call.path, patch, parseWriteOptions(call));
    callback(null, { status: 200, value: patch });
  } catch (error: unknown) {
    callback(error);
  }
}
