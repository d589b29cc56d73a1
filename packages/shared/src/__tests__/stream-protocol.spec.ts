import {
  decodeFrame,
  isAuthRequestFrame,
  isBroadcastFrame,
  isRateLimitFrame,
  readFrameToken,
  rawFrameToString,
} from '../types/stream-protocol';

describe('stream protocol frames', () => {
  describe('decodeFrame', () => {
    it('should decode buffers, fragments and array buffers', () => {
      const text = '{"type":"ping"}';

      expect(decodeFrame(Buffer.from(text))).toEqual({ type: 'ping' });
      expect(decodeFrame([Buffer.from('{"type":'), Buffer.from('"ping"}')])).toEqual({ type: 'ping' });
      const arrayBuffer = new ArrayBuffer(text.length);
      new Uint8Array(arrayBuffer).set(Buffer.from(text));
      expect(rawFrameToString(arrayBuffer)).toBe(text);
    });

    it('should return undefined for non-JSON', () => {
      expect(decodeFrame(Buffer.from('not json'))).toBeUndefined();
    });
  });

  describe('guards', () => {
    it('should require a non-empty client id in the auth request', () => {
      expect(isAuthRequestFrame({ api_key: 'test-secret', client_id: 'a' })).toBe(true);
      expect(isAuthRequestFrame({ api_key: 'test-secret', client_id: '' })).toBe(false);
      expect(isAuthRequestFrame({ api_key: 1, client_id: 'a' })).toBe(false);
      expect(isAuthRequestFrame(['test-secret', 'a'])).toBe(false);
    });

    it('should recognise broadcast and rate limit frames', () => {
      expect(isBroadcastFrame({ data: { cars: 1 }, hmac: 'ab' })).toBe(true);
      expect(isBroadcastFrame({ data: [1], hmac: 'ab' })).toBe(false);
      expect(isRateLimitFrame({ error: 'rate limit exceeded' })).toBe(true);
      expect(isRateLimitFrame({ error: 'other' })).toBe(false);
    });

    it('should read an optional token', () => {
      expect(readFrameToken({ type: 'ping', token: 'tok' })).toBe('tok');
      expect(readFrameToken({ type: 'ping', token: 5 })).toBeUndefined();
      expect(readFrameToken(null)).toBeUndefined();
    });
  });
});
