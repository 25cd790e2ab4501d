import { describe, it, expect } from 'vitest';
import { LineDecoder } from '../../../src/domain/services/LineDecoder.js';

describe('LineDecoder', () => {
  describe("strategy 'latin1-to-utf8'", () => {
    const decoder = new LineDecoder('latin1-to-utf8');

    it('should decode plain ASCII', () => {
      expect(decoder.decode(Buffer.from('CatDisplayName=Rock', 'ascii'))).toBe('CatDisplayName=Rock');
    });

    it('should decode Latin-1 accented characters', () => {
      const bytes = Buffer.from([0x43, 0x61, 0x66, 0xe9]);
      expect(decoder.decode(bytes)).toBe('Café');
    });

    it('should fall back to UTF-8 when the Latin-1 reading has control characters', () => {
      // "Łódź" in UTF-8: Ł is C5 81, and 0x81 is a C1 control in Latin-1
      const bytes = Buffer.from('Łódź', 'utf-8');
      expect(decoder.decode(bytes)).toBe('Łódź');
    });

    it('should keep the Latin-1 reading of UTF-8 bytes that contain no control characters', () => {
      const bytes = Buffer.from([0xc3, 0xa9]);
      expect(decoder.decode(bytes)).toBe('Ã©');
    });

    it('should keep the Latin-1 reading when the bytes are not valid UTF-8', () => {
      // 0x92 is a Windows-1252 apostrophe, a C1 control in Latin-1
      expect(decoder.decode(Buffer.from('It\x92s', 'latin1'))).toBe('It\u0092s');
    });

    it('should keep the Latin-1 reading when the UTF-8 reading has control characters too', () => {
      // C2 85 is valid UTF-8 for U+0085
      expect(decoder.decode(Buffer.from([0x41, 0xc2, 0x85]))).toBe('A\u00c2\u0085');
    });

    it('should decode a subarray without reading outside its bounds', () => {
      const whole = Buffer.from('xxCafé=1yy', 'latin1');
      expect(decoder.decode(whole.subarray(2, 8))).toBe('Café=1');
    });
  });

  describe("strategy 'latin1-escape'", () => {
    const decoder = new LineDecoder('latin1-escape');

    it('should escape control characters', () => {
      expect(decoder.decode(Buffer.from([0x41, 0x85]))).toBe('A\\x85');
    });

    it('should decode Latin-1 text unchanged', () => {
      expect(decoder.decode(Buffer.from([0x4e, 0xfc]))).toBe('Nü');
    });
  });

  it("should default to 'latin1-to-utf8'", () => {
    expect(new LineDecoder().decode(Buffer.from('Łódź', 'utf-8'))).toBe('Łódź');
  });
});
