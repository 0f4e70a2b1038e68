/**
 * Byte reversal lookup table: entry `b` holds the bits of `b` in reverse
 * order, so bit 0 ends up in bit 7 and vice versa.
 */
export class MirrorTable {
    constructor() {
        for (let i = 0; i < 0x100; i++) {
            this.table[i] =
                ((i & 0x01) << 7) |
                ((i & 0x02) << 5) |
                ((i & 0x04) << 3) |
                ((i & 0x08) << 1) |
                ((i & 0x10) >>> 1) |
                ((i & 0x20) >>> 3) |
                ((i & 0x40) >>> 5) |
                ((i & 0x80) >>> 7);
        }
    }

    reverse(byte: number): number {
        return this.table[byte & 0xff];
    }

    get size(): number {
        return this.table.length;
    }

    private readonly table = new Uint8Array(0x100);
}
