import { InvalidArgument, InvalidConfiguration } from './errors';
import { System, silentSystem } from './system';

import { MirrorTable } from './mirror-table';
import { PatternSequence } from './sequence';

export type PatternValue = bigint | number;

export interface ScanOptions {
    // Yield the running pattern (default) or only the bits added at each step.
    accumulate?: boolean;
}

export const DEFAULT_WIDTH = 32;
export const DEFAULT_STEP = 3;

export class PatternEngine {
    constructor(readonly width = DEFAULT_WIDTH, private system: System = silentSystem()) {
        if (!Number.isInteger(width) || width <= 0 || width % 8 !== 0) {
            system.error(`invalid pattern width ${width}`);
            throw new InvalidConfiguration(`width must be a positive multiple of 8, got ${width}`);
        }

        this.byteCount = width / 8;
        this.mask = (1n << BigInt(width)) - 1n;
        this.mirrorTable = new MirrorTable();

        system.debug(`pattern engine initialized with width ${width}`);
    }

    sweepOnes(): PatternSequence {
        return new PatternSequence(this.width, (i) => 1n << BigInt(i));
    }

    sweepZeros(): PatternSequence {
        return new PatternSequence(this.width, (i) => this.mask ^ (1n << BigInt(i)));
    }

    toggleSparse(step = DEFAULT_STEP): PatternSequence {
        if (!Number.isInteger(step) || step <= 0) {
            this.system.error(`invalid toggle step ${step}`);
            throw new InvalidArgument(`step must be a positive integer, got ${step}`);
        }

        return new PatternSequence(Math.ceil(this.width / step), (i, previous) => previous | (1n << BigInt(i * step)));
    }

    scanPatterns({ accumulate = true }: ScanOptions = {}): PatternSequence {
        const center = this.width / 2;

        return new PatternSequence(center + 1, (k, previous) => {
            let ring = 1n << BigInt(center - k);
            if (center + k < this.width) ring |= 1n << BigInt(center + k);

            return accumulate ? previous | ring : ring;
        });
    }

    mirror(value: PatternValue): bigint {
        const masked = this.toPattern(value);
        let result = 0n;

        for (let i = 0; i < this.byteCount; i++) {
            const byte = Number((masked >> BigInt(i * 8)) & 0xffn);

            result |= BigInt(this.mirrorTable.reverse(byte)) << BigInt((this.byteCount - 1 - i) * 8);
        }

        return result;
    }

    countOnes(value: PatternValue): number {
        let remaining = this.toPattern(value);
        let count = 0;

        while (remaining !== 0n) {
            remaining &= remaining - 1n;
            count++;
        }

        return count;
    }

    visualize(value: PatternValue): string {
        return this.toPattern(value).toString(2).padStart(this.width, '0');
    }

    private toPattern(value: PatternValue): bigint {
        if (typeof value === 'number' && !Number.isSafeInteger(value)) {
            this.system.error(`invalid pattern value ${value}`);
            throw new InvalidArgument(`pattern value must be a safe integer, got ${value}`);
        }

        return BigInt(value) & this.mask;
    }

    readonly byteCount: number;
    readonly mask: bigint;

    private readonly mirrorTable: MirrorTable;
}
