export class InvalidConfiguration extends Error {
    constructor(message: string) {
        super(message);

        this.name = 'InvalidConfiguration';
    }
}

export class InvalidArgument extends Error {
    constructor(message: string) {
        super(message);

        this.name = 'InvalidArgument';
    }
}
