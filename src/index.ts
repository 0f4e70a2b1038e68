export { DEFAULT_STEP, DEFAULT_WIDTH, PatternEngine, PatternValue, ScanOptions } from './pattern/engine';
export { BenchmarkResult, GENERATOR_NAMES, GeneratorName, PatternDriver, PatternFrame, isGeneratorName } from './pattern/driver';
export { InvalidArgument, InvalidConfiguration } from './pattern/errors';
export { LogLevel, System, silentSystem } from './pattern/system';
export { MirrorTable } from './pattern/mirror-table';
export { PatternCursor, PatternSequence, StepFunction } from './pattern/sequence';
export { hexPattern } from './helper/format';
export { runCli } from './cli';
