import { configForLevel, describeConfig, type LevelConfig } from 'app/difficulty';
import { createLineWriter, createLogger, isLogLevel, type LogLevel, type Logger } from 'util/log';
import { runExport } from './export-history';
import { runSimulation, type SimulationInput } from './simulate';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

const USAGE = 'Usage: ball-tracker <progression|simulate|export> [options]';
const DEFAULT_PROGRESSION_LEVELS = 10;
const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

type OptionMap = ReadonlyMap<string, string>;

interface ParsedArgs {
    readonly options: OptionMap;
    readonly logLevel: LogLevel;
}

const parseOptions = (args: readonly string[]): ParsedArgs => {
    const options = new Map<string, string>();
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (!arg?.startsWith('--')) {
            continue;
        }
        const next = args[i + 1];
        if (next !== undefined && !next.startsWith('--')) {
            options.set(arg.slice(2), next);
            i++;
        } else {
            options.set(arg.slice(2), 'true');
        }
    }

    const requestedLevel = options.get('log-level');
    return {
        options,
        logLevel: isLogLevel(requestedLevel) ? requestedLevel : DEFAULT_LOG_LEVEL,
    };
};

const readNumber = (options: OptionMap, name: string): number | undefined => {
    const raw = options.get(name);
    if (raw === undefined) {
        return undefined;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new RangeError(`--${name} expects a number, got "${raw}"`);
    }
    return value;
};

const toSimulationInput = (options: OptionMap, logger: Logger): SimulationInput => {
    const seed = readNumber(options, 'seed');
    const levels = readNumber(options, 'levels');
    const accuracy = readNumber(options, 'accuracy');
    const giveUpRate = readNumber(options, 'give-up-rate');
    const userId = readNumber(options, 'user');
    const storePath = options.get('store');

    return {
        mode: 'simulate',
        ...(seed !== undefined ? { seed } : {}),
        ...(levels !== undefined ? { levels } : {}),
        ...(accuracy !== undefined ? { accuracy } : {}),
        ...(giveUpRate !== undefined ? { giveUpRate } : {}),
        ...(userId !== undefined ? { userId } : {}),
        ...(storePath ? { storePath } : {}),
        logger,
    };
};

const renderProgression = (levels: readonly LevelConfig[], format: string | undefined): string =>
    format === 'text' ? levels.map(describeConfig).join('\n') : JSON.stringify(levels);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function createCli(): CliCommand {
    const execute = async (): Promise<number> => {
        const args = process.argv.slice(2);
        const command = args[0];
        if (!command) {
            console.error(USAGE);
            return 1;
        }

        const { options, logLevel } = parseOptions(args.slice(1));
        const logger = createLogger('ball-tracker:cli', {
            minLevel: logLevel,
            writer: createLineWriter((line) => console.error(line)),
        });

        if (command === 'progression') {
            try {
                const count = readNumber(options, 'levels') ?? DEFAULT_PROGRESSION_LEVELS;
                const last = configForLevel(count);
                const levels: LevelConfig[] = [];
                for (let level = 1; level <= last.levelIndex; level++) {
                    levels.push(configForLevel(level));
                }
                console.log(renderProgression(levels, options.get('format')));
                return 0;
            } catch (error) {
                console.error(`Progression failed: ${errorMessage(error)}`);
                return 1;
            }
        }

        if (command === 'simulate') {
            try {
                const result = await runSimulation(toSimulationInput(options, logger));
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`Simulation failed: ${errorMessage(error)}`);
                return 1;
            }
        }

        if (command === 'export') {
            const storePath = options.get('store');
            if (!options.has('user') || !storePath) {
                console.error('Usage: ball-tracker export --user <id> --store <file> [--out <dir>]');
                return 1;
            }

            try {
                const outDir = options.get('out');
                const result = await runExport({
                    userId: readNumber(options, 'user') ?? 0,
                    storePath,
                    ...(outDir ? { outDir } : {}),
                    logger,
                });
                console.log(JSON.stringify(result));
                return result.ok ? 0 : 1;
            } catch (error) {
                console.error(`Export failed: ${errorMessage(error)}`);
                return 1;
            }
        }

        console.error(USAGE);
        return 1;
    };

    return {
        execute,
    };
}
