/**
 * Unit tests for response framing
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { buildHeaderBlock, ResponseWriter } from '../../http/response.js';
import { CONTENT_TYPE_HTML, jsonReply, textReply } from '../../http/types.js';
import type { Logger } from '../../logging/logger.js';
import { FakeConnection } from '../helpers/fake-connection.js';
import { createTestLogger, parseResponse, TEST_TIMESTAMP } from '../helpers/test-utils.js';

describe('buildHeaderBlock', () => {
  it('should emit the status line and fixed header set', () => {
    expect(buildHeaderBlock(200, 'OK', CONTENT_TYPE_HTML, 12).toString('latin1')).toBe(
      'HTTP/1.1 200 OK\r\n' +
        'Content-Type: text/html; charset=utf-8\r\n' +
        'Content-Length: 12\r\n' +
        'Connection: close\r\n' +
        '\r\n'
    );
  });
});

describe('ResponseWriter', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createTestLogger();
  });

  it('should write the body in chunkSize slices', async () => {
    const connection = new FakeConnection();
    const writer = new ResponseWriter(logger, 4);

    const delivered = await writer.write(connection, 200, 'OK', 'text/plain', Buffer.from('hello world'), false);

    expect(delivered).toBe(true);
    expect(connection.writes.slice(1).map((chunk) => chunk.toString())).toEqual(['hell', 'o wo', 'rld']);
    const response = parseResponse(connection.output());
    expect(response.headers['Content-Length']).toBe('11');
    expect(response.body.toString()).toBe('hello world');
  });

  it('should send identical headers and no body when suppressed', async () => {
    const getConnection = new FakeConnection();
    const headConnection = new FakeConnection();
    const writer = new ResponseWriter(logger, 8192);
    const body = Buffer.from('<p>twelve b</p>');

    await writer.write(getConnection, 200, 'OK', CONTENT_TYPE_HTML, body, false);
    await writer.write(headConnection, 200, 'OK', CONTENT_TYPE_HTML, body, true);

    const get = parseResponse(getConnection.output());
    const head = parseResponse(headConnection.output());
    expect(head.statusLine).toBe(get.statusLine);
    expect(head.headers).toEqual(get.headers);
    expect(head.headers['Content-Length']).toBe(String(body.length));
    expect(head.body.length).toBe(0);
    expect(headConnection.writes).toHaveLength(1);
  });

  it('should send an empty body with Content-Length 0', async () => {
    const connection = new FakeConnection();
    await new ResponseWriter(logger, 4).write(connection, 200, 'OK', 'text/plain', Buffer.alloc(0), false);

    expect(connection.writes).toHaveLength(1);
    expect(parseResponse(connection.output()).headers['Content-Length']).toBe('0');
  });

  it('should use the reply reason override', async () => {
    const connection = new FakeConnection();
    await new ResponseWriter(logger, 8192).send(
      connection,
      textReply(503, 'Simulated failure: 503 Service Unavailable\n', 'Service Unavailable (Simulated)'),
      false
    );

    expect(parseResponse(connection.output()).statusLine).toBe('HTTP/1.1 503 Service Unavailable (Simulated)');
  });

  it('should fall back to the standard reason phrase', async () => {
    const connection = new FakeConnection();
    await new ResponseWriter(logger, 8192).send(connection, jsonReply(200, { ok: true }), false);

    const response = parseResponse(connection.output());
    expect(response.statusLine).toBe('HTTP/1.1 200 OK');
    expect(response.headers['Content-Type']).toBe('application/json; charset=utf-8');
    expect(response.body.toString()).toBe('{"ok":true}');
  });

  it('should log and report failed writes instead of throwing', async () => {
    const connection = new FakeConnection([], { failWrites: true });

    const delivered = await new ResponseWriter(logger, 8192).send(connection, textReply(200, 'x'), false);

    expect(delivered).toBe(false);
    const lines = logger.buffer.snapshot();
    expect(lines[lines.length - 1]).toBe(
      `${TEST_TIMESTAMP} - [MainThread] - ERROR - 127.0.0.1:50000 [fake0001] - Failed to send response: write EPIPE`
    );
  });
});
