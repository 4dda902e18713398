import { describe, it, expect } from 'vitest';
import { QueryServer, SERVER_VERSION } from '../../server/QueryServer';
import { ConfigError, loadServerConfig } from '../../server/config';
import { parseClientMessage } from '../../server/protocol';
import { QueryEngine } from '../../core/QueryEngine';
import { MemoryAdapter } from '../../adapters/MemoryAdapter';

function createServer(maxRows?: number) {
  const memory = new MemoryAdapter({
    sales: [
      { region: 'east', amount: 10 },
      { region: 'west', amount: 5 },
      { region: 'east', amount: 20 },
    ],
  });
  return new QueryServer({ port: 0, maxRows }, new QueryEngine({ adapters: [memory] }));
}

function execute(requestId: string, query: string): string {
  return JSON.stringify({ type: 'execute', requestId, query });
}

describe('QueryServer', () => {
  describe('handleMessage', () => {
    it('should reject frames that are not JSON', async () => {
      const reply = await createServer().handleMessage('{nope');
      expect(reply.type).toBe('error');
      expect(reply).toMatchObject({ code: 'INVALID_MESSAGE' });
      expect(reply).not.toHaveProperty('requestId');
    });

    it('should answer pings with the same timestamp', async () => {
      const reply = await createServer().handleMessage(JSON.stringify({ type: 'ping', timestamp: 42 }));
      expect(reply).toEqual({ type: 'pong', timestamp: 42, serverTime: expect.any(Number) });
    });

    it('should return query results', async () => {
      const reply = await createServer().handleMessage(
        execute('r1', 'SELECT region, sum(amount) FROM sales GROUP BY region;'),
      );
      expect(reply).toEqual({
        type: 'result',
        requestId: 'r1',
        columns: ['region', 'sum(amount)'],
        rows: [
          ['east', 30],
          ['west', 5],
        ],
        rowCount: 2,
        truncated: false,
      });
    });

    it('should truncate rows beyond maxRows', async () => {
      const reply = await createServer(1).handleMessage(execute('r2', 'SELECT amount FROM sales;'));
      expect(reply).toEqual({
        type: 'result',
        requestId: 'r2',
        columns: ['amount'],
        rows: [[10]],
        rowCount: 3,
        truncated: true,
      });
    });

    it('should report query errors by kind', async () => {
      const reply = await createServer().handleMessage(execute('r3', 'SELECT region FROM sales GROUP BY amount;'));
      expect(reply).toEqual({
        type: 'error',
        requestId: 'r3',
        code: 'ColumnNotInGroupBy',
        message: "Column 'region' is neither aggregated nor included in GROUP BY (amount)",
        details: { column: 'region', groupKeys: ['amount'] },
      });
    });

    it('should report syntax errors', async () => {
      const reply = await createServer().handleMessage(execute('r4', 'SELECT FROM;'));
      expect(reply).toMatchObject({ type: 'error', requestId: 'r4', code: 'SyntaxError' });
    });
  });

  describe('serverInfo', () => {
    it('should list memory and json by default', () => {
      expect(new QueryServer({ port: 0 }).serverInfo()).toEqual({
        type: 'server-info',
        version: SERVER_VERSION,
        sourceTypes: ['json', 'memory'],
      });
    });

    it('should list the adapters of a given engine', () => {
      expect(createServer().serverInfo().sourceTypes).toEqual(['memory']);
    });
  });

  it('should report no port before starting', () => {
    expect(createServer().port).toBeNull();
  });
});

describe('parseClientMessage', () => {
  it('should decode execute messages', () => {
    expect(parseClientMessage(execute('a', 'SELECT * FROM t;'))).toEqual({
      type: 'execute',
      requestId: 'a',
      query: 'SELECT * FROM t;',
    });
  });

  it('should explain invalid messages', () => {
    expect(parseClientMessage('[]')).toBe('message must be a JSON object');
    expect(parseClientMessage(JSON.stringify({ type: 'execute', requestId: '', query: 'x' }))).toBe(
      "'execute' requires a non-empty string requestId",
    );
    expect(parseClientMessage(JSON.stringify({ type: 'execute', requestId: 'a' }))).toBe(
      "'execute' requires a string query",
    );
    expect(parseClientMessage(JSON.stringify({ type: 'ping', timestamp: '1' }))).toBe(
      "'ping' requires a numeric timestamp",
    );
    expect(parseClientMessage(JSON.stringify({ type: 'subscribe' }))).toBe('unknown message type "subscribe"');
    expect(parseClientMessage('{}')).toBe('unknown message type null');
  });
});

describe('loadServerConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadServerConfig({})).toEqual({ port: 8787, maxRows: 10000, debug: false });
  });

  it('should read overrides', () => {
    expect(
      loadServerConfig({
        TERRAQL_PORT: '9000',
        TERRAQL_HOST: ' 127.0.0.1 ',
        TERRAQL_MAX_ROWS: '50',
        TERRAQL_DEBUG: 'TRUE',
        TERRAQL_DATA_DIR: '/srv/data',
      }),
    ).toEqual({ port: 9000, host: '127.0.0.1', maxRows: 50, debug: true, dataDir: '/srv/data' });
  });

  it('should report every invalid variable at once', () => {
    let caught: unknown;
    try {
      loadServerConfig({ TERRAQL_PORT: '70000', TERRAQL_MAX_ROWS: '10', TERRAQL_DEBUG: 'yes' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toEqual([
      { variable: 'TERRAQL_PORT', value: '70000', message: 'must be an integer between 0 and 65535' },
      { variable: 'TERRAQL_DEBUG', value: 'yes', message: 'must be one of 1, true, 0, false' },
    ]);
    expect(caught.message).toBe(
      'Invalid server configuration:\n' +
        '  TERRAQL_PORT="70000": must be an integer between 0 and 65535\n' +
        '  TERRAQL_DEBUG="yes": must be one of 1, true, 0, false',
    );
  });
});
