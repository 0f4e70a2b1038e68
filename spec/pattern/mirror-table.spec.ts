import { MirrorTable } from '../../src/pattern/mirror-table';

describe('MirrorTable', () => {
    const table = new MirrorTable();

    it('has one entry per byte value', () => {
        expect(table.size).toBe(256);
    });

    it('reverses the bits of a byte', () => {
        expect(table.reverse(0x01)).toBe(0x80);
        expect(table.reverse(0x80)).toBe(0x01);
        expect(table.reverse(0x0f)).toBe(0xf0);
        expect(table.reverse(0b00000110)).toBe(0b01100000);
        expect(table.reverse(0xa5)).toBe(0xa5);
        expect(table.reverse(0x00)).toBe(0x00);
        expect(table.reverse(0xff)).toBe(0xff);
    });

    it('is an involution', () => {
        for (let b = 0; b < 0x100; b++) expect(table.reverse(table.reverse(b))).toBe(b);
    });

    it('agrees with a bit by bit reversal', () => {
        for (let b = 0; b < 0x100; b++) {
            let reversed = 0;
            for (let i = 0; i < 8; i++) reversed = (reversed << 1) | ((b >>> i) & 1);

            expect(table.reverse(b)).toBe(reversed);
        }
    });

    it('only looks at the low byte', () => {
        expect(table.reverse(0x101)).toBe(0x80);
    });

    it('tables of different instances are identical', () => {
        const other = new MirrorTable();

        for (let b = 0; b < 0x100; b++) expect(other.reverse(b)).toBe(table.reverse(b));
    });
});
