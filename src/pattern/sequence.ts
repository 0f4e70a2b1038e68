export type StepFunction = (index: number, previous: bigint) => bigint;

export class PatternCursor implements Iterator<bigint> {
    constructor(private readonly length: number, private readonly step: StepFunction) {}

    next(): IteratorResult<bigint> {
        if (this.index >= this.length) return { done: true, value: undefined };

        this.current = this.step(this.index++, this.current);

        return { done: false, value: this.current };
    }

    private index = 0;
    private current = 0n;
}

/**
 * A finite pattern sequence. The sequence itself holds no iteration state:
 * every iteration starts a fresh cursor whose accumulator begins at zero.
 */
export class PatternSequence implements Iterable<bigint> {
    constructor(readonly length: number, private readonly step: StepFunction) {}

    [Symbol.iterator](): PatternCursor {
        return new PatternCursor(this.length, this.step);
    }

    toArray(): Array<bigint> {
        return Array.from(this);
    }

    at(index: number): bigint | undefined {
        if (!Number.isInteger(index) || index < 0 || index >= this.length) return undefined;

        const cursor = this[Symbol.iterator]();
        let result = cursor.next();

        for (let i = 0; i < index; i++) result = cursor.next();

        return result.done ? undefined : result.value;
    }
}
