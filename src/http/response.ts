/**
 * Response framing: status line, a fixed header set, blank line, body.
 */

import { describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { Connection, connectionLabel, HttpReply, reasonPhrase } from './types.js';

export function buildHeaderBlock(
  status: number,
  reason: string,
  contentType: string,
  contentLength: number
): Buffer {
  const head =
    `HTTP/1.1 ${status} ${reason}\r\n` +
    `Content-Type: ${contentType}\r\n` +
    `Content-Length: ${contentLength}\r\n` +
    'Connection: close\r\n' +
    '\r\n';
  return Buffer.from(head, 'latin1');
}

export class ResponseWriter {
  constructor(
    private readonly logger: Logger,
    private readonly chunkSize: number
  ) {}

  /**
   * Send one complete response. Content-Length always reflects the full body,
   * even when suppressBody leaves it unsent (HEAD). Write failures are logged
   * and reported as false; they never throw.
   */
  async write(
    connection: Connection,
    status: number,
    reason: string,
    contentType: string,
    body: Buffer,
    suppressBody: boolean
  ): Promise<boolean> {
    try {
      await connection.write(buildHeaderBlock(status, reason, contentType, body.length));
      if (!suppressBody) {
        for (let offset = 0; offset < body.length; offset += this.chunkSize) {
          await connection.write(body.subarray(offset, offset + this.chunkSize));
        }
      }
      return true;
    } catch (error) {
      this.logger.error(`${connectionLabel(connection)} - Failed to send response: ${describeError(error)}`);
      return false;
    }
  }

  send(connection: Connection, reply: HttpReply, suppressBody: boolean): Promise<boolean> {
    return this.write(
      connection,
      reply.status,
      reply.reason ?? reasonPhrase(reply.status),
      reply.contentType,
      reply.body,
      suppressBody
    );
  }
}
