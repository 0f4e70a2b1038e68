import { PatternEngine, PatternValue } from './engine';
import { System, silentSystem } from './system';

import { Event } from 'microevent.ts';
import { InvalidArgument } from './errors';
import { PatternSequence } from './sequence';

export const GENERATOR_NAMES = ['sweep-ones', 'sweep-zeros', 'toggle-sparse', 'scan', 'scan-ring'] as const;

export type GeneratorName = (typeof GENERATOR_NAMES)[number];

export interface PatternFrame {
    index: number;
    value: bigint;
    row: string;
}

export interface BenchmarkResult {
    operation: string;
    milliseconds: number;
}

export function isGeneratorName(name: string): name is GeneratorName {
    return GENERATOR_NAMES.some((candidate) => candidate === name);
}

export class PatternDriver {
    constructor(private engine: PatternEngine, private system: System = silentSystem()) {}

    sequence(name: string, step?: number): PatternSequence {
        if (!isGeneratorName(name)) {
            this.system.error(`unknown generator ${name}`);
            throw new InvalidArgument(`unknown generator ${name}`);
        }

        switch (name) {
            case 'sweep-ones':
                return this.engine.sweepOnes();

            case 'sweep-zeros':
                return this.engine.sweepZeros();

            case 'toggle-sparse':
                return this.engine.toggleSparse(step);

            case 'scan':
                return this.engine.scanPatterns();

            case 'scan-ring':
                return this.engine.scanPatterns({ accumulate: false });
        }
    }

    run(name: string, step?: number): number {
        const sequence = this.sequence(name, step);
        let index = 0;

        for (const value of sequence) {
            this.onPattern.dispatch({ index: index++, value, row: this.engine.visualize(value) });
        }

        this.system.debug(`${name}: dispatched ${index} patterns`);
        this.onComplete.dispatch(index);

        return index;
    }

    benchmark(iterations = 1000, now: () => number = () => performance.now()): Array<BenchmarkResult> {
        const time = (operation: string, body: () => void): BenchmarkResult => {
            const start = now();
            body();

            return { operation, milliseconds: now() - start };
        };

        const consume = (values: Iterable<PatternValue>) => {
            for (const value of values) this.engine.countOnes(value);
        };

        const results = GENERATOR_NAMES.filter((name) => name !== 'scan-ring').map((name) => time(name, () => consume(this.sequence(name))));

        results.push(
            time('mirror', () => {
                for (let i = 0; i < iterations; i++) this.engine.mirror(i);
            })
        );

        return results;
    }

    readonly onPattern = new Event<PatternFrame>();
    readonly onComplete = new Event<number>();
}
