import { bigintval, hexPattern, uintval } from '../../src/helper/format';

describe('format helpers', () => {
    it('hexPattern pads to the width', () => {
        expect(hexPattern(0x2c48n, 16)).toBe('0x2c48');
        expect(hexPattern(1n, 32)).toBe('0x00000001');
        expect(hexPattern(0n, 8)).toBe('0x00');
    });

    it('hexPattern masks to the width', () => {
        expect(hexPattern(0x1ffn, 8)).toBe('0xff');
    });

    it('uintval parses decimal and hex', () => {
        expect(uintval('12')).toBe(12);
        expect(uintval('0x10')).toBe(16);
        expect(uintval(7)).toBe(7);
    });

    it('uintval falls back to the default', () => {
        expect(uintval('x')).toBeUndefined();
        expect(uintval('-3', 5)).toBe(5);
        expect(uintval(undefined, 4)).toBe(4);
        expect(uintval('8abc')).toBeUndefined();
        expect(uintval('2.5', 1)).toBe(1);
        expect(uintval('0x')).toBeUndefined();
    });

    it('bigintval parses values of any size', () => {
        expect(bigintval('42')).toBe(42n);
        expect(bigintval('0x1234')).toBe(0x1234n);
        expect(bigintval('340282366920938463463374607431768211455')).toBe((1n << 128n) - 1n);
    });

    it('bigintval rejects negative and malformed input', () => {
        expect(bigintval('-1')).toBeUndefined();
        expect(bigintval('abc')).toBeUndefined();
        expect(bigintval('')).toBeUndefined();
        expect(bigintval(undefined)).toBeUndefined();
    });
});
