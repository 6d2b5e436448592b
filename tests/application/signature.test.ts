import { describe, it, expect } from 'vitest';
import { createHmac } from 'node:crypto';
import { signPayload, verifySignature } from '../../src/application/signature.js';

const SECRET = 'test-secret';
const body = Buffer.from('{"zen":"Keep it logically awesome."}');

describe('signPayload', () => {
  it('produces sha256=<hex> of the HMAC', () => {
    const expected = createHmac('sha256', SECRET).update(body).digest('hex');
    expect(signPayload(body, SECRET)).toBe(`sha256=${expected}`);
  });
});

describe('verifySignature', () => {
  it('accepts a correct signature', () => {
    expect(verifySignature(body, signPayload(body, SECRET), SECRET)).toBe(true);
  });

  it('accepts an upper-case hex digest', () => {
    const sig = signPayload(body, SECRET);
    expect(verifySignature(body, `sha256=${sig.slice(7).toUpperCase()}`, SECRET)).toBe(true);
  });

  it('rejects a signature made with another secret', () => {
    expect(verifySignature(body, signPayload(body, 'other-secret'), SECRET)).toBe(false);
  });

  it('rejects when the body changed', () => {
    const sig = signPayload(body, SECRET);
    expect(verifySignature(Buffer.from('{"zen":"changed"}'), sig, SECRET)).toBe(false);
  });

  it('rejects a missing header', () => {
    expect(verifySignature(body, undefined, SECRET)).toBe(false);
  });

  it('rejects a header without the sha256= prefix', () => {
    const hex = signPayload(body, SECRET).slice('sha256='.length);
    expect(verifySignature(body, hex, SECRET)).toBe(false);
    expect(verifySignature(body, `sha1=${hex}`, SECRET)).toBe(false);
  });

  it('rejects a non-hex digest', () => {
    expect(verifySignature(body, `sha256=${'zz'.repeat(32)}`, SECRET)).toBe(false);
  });

  it('rejects an odd-length digest', () => {
    expect(verifySignature(body, 'sha256=abc', SECRET)).toBe(false);
  });

  it('rejects a digest of the wrong length', () => {
    expect(verifySignature(body, `sha256=${'ab'.repeat(16)}`, SECRET)).toBe(false);
  });

  it('rejects an empty digest', () => {
    expect(verifySignature(body, 'sha256=', SECRET)).toBe(false);
  });
});
