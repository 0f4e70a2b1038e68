import { DEFAULT_STEP, DEFAULT_WIDTH, PatternEngine } from './pattern/engine';
import { GENERATOR_NAMES, PatternDriver } from './pattern/driver';
import { bigintval, hexPattern, uintval } from './helper/format';

import { System } from './pattern/system';

const HELP = `Usage: bitbrush [--width bits] <command> [args]

help                                    Show help
sweep-ones                              Single 1 bit sweeping from LSB to MSB
sweep-zeros                             Single 0 bit sweeping from LSB to MSB
toggle-sparse [step=${DEFAULT_STEP}]                  Set every step-th bit, one more per row
scan                                    Grow a symmetric pattern from the center outward
scan-ring                               Only the bits added by each scan step
mirror <value>                          Reverse the bit order of value
count <value>                           Count the set bits of value
show <value>                            Print value as a binary row
bench [iterations=1000]                 Time every generator and mirror

Values are decimal or 0x-prefixed hex. The default width is ${DEFAULT_WIDTH} bits.`;

type Command = (engine: PatternEngine, args: Array<string>, system: System) => number;

function valueCommand(body: (engine: PatternEngine, value: bigint, system: System) => void): Command {
    return (engine, args, system) => {
        const value = bigintval(args[0]);

        if (value === undefined) {
            system.error('missing or invalid value');
            return 1;
        }

        body(engine, value, system);
        return 0;
    };
}

function generatorCommand(name: string): Command {
    return (engine, args, system) => {
        const driver = new PatternDriver(engine, system);
        const step = name !== 'toggle-sparse' || args[0] === undefined ? undefined : Number(args[0]);

        driver.onPattern.addHandler(({ index, row, value }) =>
            system.info(`${index.toString().padStart(3, ' ')}  ${row}  ${hexPattern(value, engine.width)}`)
        );

        driver.run(name, step);

        return 0;
    };
}

const commands: Record<string, Command> = {
    help(_engine, _args, system) {
        system.info(HELP);
        return 0;
    },
    mirror: valueCommand((engine, value, system) => {
        const mirrored = engine.mirror(value);

        system.info(`${engine.visualize(value)} -> ${engine.visualize(mirrored)}  ${hexPattern(mirrored, engine.width)}`);
    }),
    count: valueCommand((engine, value, system) => system.info(`${engine.countOnes(value)}`)),
    show: valueCommand((engine, value, system) => system.info(`${engine.visualize(value)}  ${hexPattern(value, engine.width)}`)),
    bench(engine, args, system) {
        const driver = new PatternDriver(engine, system);

        for (const { operation, milliseconds } of driver.benchmark(uintval(args[0], 1000))) {
            system.info(`${operation.padEnd(16, ' ')}${milliseconds.toFixed(3)} ms`);
        }

        return 0;
    },
};

for (const name of GENERATOR_NAMES) commands[name] = generatorCommand(name);

/**
 * Runs one command line invocation (arguments without the node binary and
 * script path) and returns the process exit code.
 */
export function runCli(argv: Array<string>, print: (message: string) => void): number {
    const system = new System(print);
    let args = argv;
    let width = DEFAULT_WIDTH;

    if (args[0] === '--width' || args[0] === '-w') {
        const parsed = uintval(args[1]);

        if (parsed === undefined) {
            system.error('missing or invalid width');
            return 1;
        }

        width = parsed;
        args = args.slice(2);
    }

    const [name = 'help', ...rest] = args;
    const command = Object.prototype.hasOwnProperty.call(commands, name) ? commands[name] : undefined;

    if (!command) {
        system.error(`unknown command ${name}`);
        return 1;
    }

    try {
        return command(new PatternEngine(width, system), rest, system);
    } catch (e) {
        system.error(`error: ${e instanceof Error ? e.message : String(e)}`);
        return 1;
    }
}
