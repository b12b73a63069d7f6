/**
 * Ledger adapter tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, jest } from '@jest/globals';
import { createServer, type IncomingMessage, type Server } from 'http';
import { HttpLedgerAdapter, InMemoryLedger, LedgerError } from '../src/stakevote/adapters/ledger.js';
import { ErrorCodes } from '../src/stakevote/types.js';

describe('InMemoryLedger', () => {
  let ledger: InMemoryLedger;

  beforeEach(() => {
    ledger = new InMemoryLedger();
    ledger.mint('alice', 100n);
    ledger.approve('alice', 50n);
  });

  it('should debit against the allowance into the treasury', async () => {
    await expect(ledger.debit('alice', 30n, 'd-1')).resolves.toBe(true);

    expect(ledger.balanceOf('alice')).toBe(70n);
    expect(ledger.allowance('alice')).toBe(20n);
    expect(ledger.treasuryBalance()).toBe(30n);
  });

  it('should refuse a debit above the allowance', async () => {
    await expect(ledger.debit('alice', 51n, 'd-1')).resolves.toBe(false);

    expect(ledger.balanceOf('alice')).toBe(100n);
    expect(ledger.allowance('alice')).toBe(50n);
  });

  it('should refuse a debit above the balance', async () => {
    ledger.approve('alice', 500n);

    await expect(ledger.debit('alice', 101n, 'd-1')).resolves.toBe(false);
    expect(ledger.balanceOf('alice')).toBe(100n);
  });

  it('should refuse non-positive amounts', async () => {
    await expect(ledger.debit('alice', 0n, 'd-1')).resolves.toBe(false);
    await expect(ledger.credit('alice', 0n, 'c-1')).resolves.toBe(false);
  });

  it('should credit out of the treasury', async () => {
    ledger.fundRewards(10n);

    await expect(ledger.credit('bob', 4n, 'c-1')).resolves.toBe(true);
    expect(ledger.balanceOf('bob')).toBe(4n);
    expect(ledger.treasuryBalance()).toBe(6n);
  });

  it('should refuse a credit the treasury cannot cover', async () => {
    ledger.fundRewards(3n);

    await expect(ledger.credit('bob', 4n, 'c-1')).resolves.toBe(false);
    expect(ledger.balanceOf('bob')).toBe(0n);
    expect(ledger.treasuryBalance()).toBe(3n);
  });

  it('should move funds once per reference', async () => {
    ledger.fundRewards(10n);

    await expect(ledger.credit('bob', 4n, 'c-1')).resolves.toBe(true);
    await expect(ledger.credit('bob', 4n, 'c-1')).resolves.toBe(true);
    await expect(ledger.debit('alice', 5n, 'd-1')).resolves.toBe(true);
    await expect(ledger.debit('alice', 5n, 'd-1')).resolves.toBe(true);

    expect(ledger.balanceOf('bob')).toBe(4n);
    expect(ledger.balanceOf('alice')).toBe(95n);
    expect(ledger.treasuryBalance()).toBe(11n);
  });

  it('should let a refused reference be retried', async () => {
    await expect(ledger.credit('bob', 4n, 'c-1')).resolves.toBe(false);

    ledger.fundRewards(4n);
    await expect(ledger.credit('bob', 4n, 'c-1')).resolves.toBe(true);
    expect(ledger.balanceOf('bob')).toBe(4n);
  });
});

describe('HttpLedgerAdapter', () => {
  let server: Server;
  let url: string;
  const received: { path: string | undefined; idempotencyKey: string | undefined; body: unknown }[] = [];
  let respond: (path: string | undefined) => { status: number; body: unknown };

  function readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      let data = '';
      req.on('data', (chunk: Buffer) => {
        data += chunk.toString();
      });
      req.on('end', () => resolve(data));
      req.on('error', reject);
    });
  }

  beforeAll(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});

    server = createServer((req, res) => {
      readBody(req).then(raw => {
        const key = req.headers['idempotency-key'];
        received.push({
          path: req.url,
          idempotencyKey: typeof key === 'string' ? key : undefined,
          body: raw ? JSON.parse(raw) : null,
        });
        const reply = respond(req.url);
        res.writeHead(reply.status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(reply.body));
      }, (error: unknown) => {
        res.writeHead(500);
        res.end(String(error));
      });
    });

    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Ledger stand-in is not listening on a port');
    }
    url = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    received.length = 0;
    respond = () => ({ status: 200, body: { ok: true } });
  });

  it('should post debits with the amount as a decimal string', async () => {
    const adapter = new HttpLedgerAdapter({ url });

    await expect(adapter.debit('alice', 12345678901234567890n, 'vote:1')).resolves.toBe(true);
    expect(received).toEqual([
      {
        path: '/v1/debit',
        idempotencyKey: 'vote:1',
        body: { from: 'alice', amount: '12345678901234567890', reference: 'vote:1' },
      },
    ]);
  });

  it('should post credits with their reference as the idempotency key', async () => {
    const adapter = new HttpLedgerAdapter({ url });

    await expect(adapter.credit('bob', 8n, 'unstake:1:bob')).resolves.toBe(true);
    expect(received).toEqual([
      {
        path: '/v1/credit',
        idempotencyKey: 'unstake:1:bob',
        body: { to: 'bob', amount: '8', reference: 'unstake:1:bob' },
      },
    ]);
  });

  it('should report a refused transfer as false', async () => {
    respond = () => ({ status: 200, body: { ok: false } });
    const adapter = new HttpLedgerAdapter({ url });

    await expect(adapter.debit('alice', 1n, 'vote:2')).resolves.toBe(false);
  });

  it('should raise LedgerError on a server error', async () => {
    respond = () => ({ status: 500, body: { error: 'down' } });
    const adapter = new HttpLedgerAdapter({ url });

    const error = await adapter.credit('bob', 1n, 'unstake:1:bob').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LedgerError);
    expect(error).toMatchObject({ code: ErrorCodes.LEDGER_ERROR, statusCode: 502 });
  });

  it('should check health', async () => {
    await expect(new HttpLedgerAdapter({ url }).healthCheck()).resolves.toBe(true);

    respond = () => ({ status: 503, body: {} });
    await expect(new HttpLedgerAdapter({ url }).healthCheck()).resolves.toBe(false);
  });

  it('should raise LedgerError when the ledger is unreachable', async () => {
    const adapter = new HttpLedgerAdapter({ url: 'http://127.0.0.1:1', timeout: 1000 });

    await expect(adapter.debit('alice', 1n, 'vote:3')).rejects.toMatchObject({ code: ErrorCodes.LEDGER_ERROR });
    await expect(adapter.healthCheck()).resolves.toBe(false);
  });
});
