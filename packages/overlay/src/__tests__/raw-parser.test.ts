import { describe, it, expect } from 'vitest';
import { ParseError } from '../errors.js';
import { parseStatus } from '../raw-parser.js';
import { rawPeer, rawStatus, statusBytes } from './fixtures.js';

function parseError(bytes: Uint8Array): ParseError {
  const result = parseStatus(bytes);
  if (result.success) throw new Error('expected parse to fail');
  return result.error;
}

describe('parseStatus', () => {
  it('accepts a minimal document and fills defaults', () => {
    const result = parseStatus(
      statusBytes({ BackendState: 'Running', Self: { ID: 'n-self', HostName: 'alpha' } }),
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.Peer).toEqual({});
    expect(result.data.Self.TailscaleIPs).toEqual([]);
    expect(result.data.Self.AllowedIPs).toEqual([]);
    expect(result.data.Self.Online).toBe(false);
    expect(result.data.Self.DNSName).toBe('');
  });

  it('treats null lists and a null peer map as empty', () => {
    const result = parseStatus(
      statusBytes(rawStatus({ Peer: null, Self: rawPeer({ ID: 'n-self', Tags: null, AllowedIPs: null }) })),
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.Peer).toEqual({});
    expect(result.data.Self.Tags).toEqual([]);
    expect(result.data.Self.AllowedIPs).toEqual([]);
  });

  it('drops unknown keys', () => {
    const result = parseStatus(statusBytes(rawStatus({ Health: ['warning'] })));
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect('Health' in result.data).toBe(false);
  });

  it('ignores traffic counters, whatever their value', () => {
    const result = parseStatus(
      statusBytes(rawStatus({ Self: rawPeer({ ID: 'n-self', RxBytes: -1, TxBytes: 'n/a' }) })),
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect('RxBytes' in result.data.Self).toBe(false);
    expect('TxBytes' in result.data.Self).toBe(false);
  });

  it('rejects invalid UTF-8', () => {
    const error = parseError(Buffer.from([0x7b, 0xff, 0xfe, 0x7d]));
    expect(error.code).toBe('PARSE_ERROR');
    expect(error.message).toBe('agent output is not valid UTF-8');
  });

  it('rejects invalid JSON', () => {
    const error = parseError(Buffer.from('{not json', 'utf8'));
    expect(error).toBeInstanceOf(ParseError);
    expect(error.message.startsWith('agent output is not valid JSON: ')).toBe(true);
  });

  it('fails closed when an identity field is missing', () => {
    const error = parseError(statusBytes({ BackendState: 'Running', Self: { HostName: 'alpha' } }));
    expect(error.issues).toEqual(['Self.ID: Required']);
    expect(error.message).toBe('agent status does not match schema (Self.ID: Required)');
  });

  it('fails closed on an empty device id', () => {
    const error = parseError(statusBytes(rawStatus({ Self: rawPeer({ ID: '' }) })));
    expect(error.issues[0]?.startsWith('Self.ID: ')).toBe(true);
  });

  it('fails closed on a malformed route in any peer', () => {
    const error = parseError(
      statusBytes(rawStatus({ Peer: { 'nodekey:1': rawPeer({ AllowedIPs: ['10.0.0.0/99'] }) } })),
    );
    expect(error.issues).toEqual(['Peer.nodekey:1.AllowedIPs.0: invalid CIDR']);
  });

  it('fails closed on a wrongly typed field', () => {
    const error = parseError(statusBytes(rawStatus({ Self: rawPeer({ Online: 'yes' }) })));
    expect(error.issues[0]?.startsWith('Self.Online: ')).toBe(true);
  });

  it('rejects a document that is not an object', () => {
    const error = parseError(Buffer.from('[]', 'utf8'));
    expect(error.issues[0]?.startsWith('(root): ')).toBe(true);
  });
});
