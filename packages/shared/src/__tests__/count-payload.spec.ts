import {
  checkCountPayload,
  checkFrameSize,
  sanitizeCountPayload,
  validateCountPayload,
  MAX_FRAME_BYTES,
} from '../validation/count-payload';

describe('count payload validation', () => {
  const valid = { cars: 5, vans: 2, motors: 3, buses: 1, bicycles: 0 };

  describe('validateCountPayload', () => {
    it('should accept five non-negative integers', () => {
      expect(validateCountPayload(valid)).toBe(true);
    });

    it('should accept an optional numeric timestamp', () => {
      expect(validateCountPayload({ ...valid, timestamp: 1700000000.25 })).toBe(true);
    });

    it.each(['cars', 'vans', 'motors', 'buses', 'bicycles'])('should reject a payload missing %s', (key) => {
      const payload: Record<string, unknown> = { ...valid };
      delete payload[key];
      expect(validateCountPayload(payload)).toBe(false);
    });

    it('should reject negative counts', () => {
      expect(validateCountPayload({ ...valid, cars: -1 })).toBe(false);
    });

    it('should reject fractional counts', () => {
      expect(validateCountPayload({ ...valid, vans: 1.5 })).toBe(false);
    });

    it('should reject counts of the wrong type', () => {
      expect(validateCountPayload({ ...valid, buses: '1' })).toBe(false);
      expect(validateCountPayload({ ...valid, buses: true })).toBe(false);
      expect(validateCountPayload({ ...valid, buses: null })).toBe(false);
    });

    it('should reject a non-numeric timestamp', () => {
      expect(validateCountPayload({ ...valid, timestamp: 'now' })).toBe(false);
    });

    it('should reject values that are not mappings', () => {
      expect(validateCountPayload(null)).toBe(false);
      expect(validateCountPayload([5, 2, 3, 1, 0])).toBe(false);
      expect(validateCountPayload('cars=5')).toBe(false);
    });

    it('should tolerate unrecognised extra keys', () => {
      expect(validateCountPayload({ ...valid, trucks: 4 })).toBe(true);
    });
  });

  describe('checkCountPayload', () => {
    it('should name the offending field', () => {
      const result = checkCountPayload({ ...valid, motors: -3 });
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.issues.map((issue) => issue.path)).toEqual(['motors']);
      }
    });
  });

  describe('sanitizeCountPayload', () => {
    it('should drop unrecognised keys', () => {
      expect(sanitizeCountPayload({ ...valid, trucks: 4, note: 'x' })).toEqual(valid);
    });

    it('should clamp negatives to zero and truncate fractions', () => {
      expect(sanitizeCountPayload({ cars: -4, vans: 2.9, motors: 3, buses: 1, bicycles: 0 })).toEqual({
        cars: 0,
        vans: 2,
        motors: 3,
        buses: 1,
        bicycles: 0,
      });
    });

    it('should coerce the timestamp to an integer', () => {
      expect(sanitizeCountPayload({ ...valid, timestamp: 1700000000.75 })).toEqual({ ...valid, timestamp: 1700000000 });
    });

    it('should discard non-numeric values', () => {
      expect(sanitizeCountPayload({ ...valid, cars: 'many' })).toEqual({ ...valid, cars: 0 });
    });
  });

  describe('checkFrameSize', () => {
    it('should accept a frame exactly at the cap', () => {
      expect(checkFrameSize('a'.repeat(MAX_FRAME_BYTES))).toBe(true);
    });

    it('should reject a frame one byte over the cap', () => {
      expect(checkFrameSize('a'.repeat(MAX_FRAME_BYTES + 1))).toBe(false);
    });

    it('should measure multi-byte characters in bytes', () => {
      // "é" is two bytes in UTF-8
      expect(checkFrameSize('é'.repeat(MAX_FRAME_BYTES / 2 + 1))).toBe(false);
    });
  });
});
