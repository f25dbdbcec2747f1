import {
    OUTPUT_FORMAT_VALUES,
    SORT_KEY_VALUES,
    normalizeOutputFormat,
    normalizeSortKey,
    type OutputFormat,
    type SortKey,
} from "@lsmp3/listing-contract";
import { loadConfig, type ListingDefaults } from "./config";
import { listPaths } from "./services/pathWalker";
import type { TagExtractor } from "./services/tagExtractor";
import {
    groupResults,
    renderJsonOutput,
    renderTableOutput,
} from "./services/listingRenderer";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    describeError,
    isRecoverable,
} from "./utils/errors";
import { logger, setLogLevel, withLogTiming } from "./utils/logger";

export const CLI_VERSION = "1.0.0";

const log = logger.child("cli");

export const USAGE = `Usage: lsmp3 [OPTIONS] [FILE]...

List MP3 files with title, artist, album, year, track and genre metadata.

Arguments:
  [FILE]...               The FILEs to list information about (the current directory by default)

Options:
  -f, --format <WORD>     The output format to use [default: table] [possible values: ${OUTPUT_FORMAT_VALUES.join(", ")}]
  -r, --reverse           Reverse order while sorting
  -R, --recursive         List subdirectories recursively
  -s, --sort <WORD>       Sort by WORD (can be set multiple times) [default: file-name] [possible values: ${SORT_KEY_VALUES.join(", ")}]
  -h, --help              Print help information
  -V, --version           Print version information
`;

export interface CliArguments {
    files: string[];
    format: OutputFormat;
    sortBy: SortKey[];
    reverse: boolean;
    recursive: boolean;
    help: boolean;
    version: boolean;
}

export interface CliIO {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

export interface RunOptions {
    io?: CliIO;
    env?: NodeJS.ProcessEnv;
    /** Listed when no FILE is given. */
    defaultPath?: string;
    tagExtractor?: TagExtractor;
}

const processIO: CliIO = {
    stdout: (text) => {
        process.stdout.write(text);
    },
    stderr: (text) => {
        process.stderr.write(text);
    },
};

function invalidArgument(message: string): AppError {
    return new AppError(
        ErrorCode.INVALID_ARGUMENT,
        ErrorCategory.RECOVERABLE,
        message
    );
}

function parseFormat(value: string): OutputFormat {
    const format = normalizeOutputFormat(value);
    if (!format) {
        throw invalidArgument(
            `invalid value ${JSON.stringify(value)} for '--format <WORD>'`
        );
    }
    return format;
}

function parseSortKey(value: string): SortKey {
    const key = normalizeSortKey(value);
    if (!key) {
        throw invalidArgument(
            `invalid value ${JSON.stringify(value)} for '--sort <WORD>'`
        );
    }
    return key;
}

/**
 * Parses command line arguments (without the node and script entries).
 * `--` ends option parsing; everything after it is a FILE.
 */
export function parseArguments(
    argv: readonly string[],
    defaults: ListingDefaults
): CliArguments {
    const parsed: CliArguments = {
        files: [],
        format: defaults.format,
        sortBy: [],
        reverse: false,
        recursive: defaults.recursive,
        help: false,
        version: false,
    };

    let index = 0;
    const takeValue = (option: string, inline: string | undefined): string => {
        if (inline !== undefined) {
            return inline;
        }
        index++;
        const value = argv[index];
        if (value === undefined) {
            throw invalidArgument(
                `a value is required for '${option} <WORD>' but none was supplied`
            );
        }
        return value;
    };

    for (; index < argv.length; index++) {
        const arg = argv[index];

        if (arg === "--") {
            parsed.files.push(...argv.slice(index + 1));
            break;
        }
        if (arg === "-" || !arg.startsWith("-")) {
            parsed.files.push(arg);
            continue;
        }

        const equalsAt = arg.startsWith("--") ? arg.indexOf("=") : -1;
        const option = equalsAt >= 0 ? arg.slice(0, equalsAt) : arg;
        const inline = equalsAt >= 0 ? arg.slice(equalsAt + 1) : undefined;

        switch (option) {
            case "-f":
            case "--format":
                parsed.format = parseFormat(takeValue("--format", inline));
                break;
            case "-s":
            case "--sort":
                parsed.sortBy.push(parseSortKey(takeValue("--sort", inline)));
                break;
            case "-r":
            case "--reverse":
                parsed.reverse = true;
                break;
            case "-R":
            case "--recursive":
                parsed.recursive = true;
                break;
            case "-h":
            case "--help":
                parsed.help = true;
                break;
            case "-V":
            case "--version":
                parsed.version = true;
                break;
            default:
                throw invalidArgument(`unexpected argument '${arg}' found`);
        }
    }

    if (parsed.sortBy.length === 0) {
        parsed.sortBy = [...defaults.sortBy];
    }
    return parsed;
}

const capitalizeFirstLetter = (value: string) =>
    value.length > 0 ? value[0].toUpperCase() + value.slice(1) : value;

/** Runs the command and resolves with the process exit code. */
export async function run(
    argv: readonly string[],
    options: RunOptions = {}
): Promise<number> {
    const io = options.io ?? processIO;

    try {
        const config = loadConfig(options.env ?? process.env);
        setLogLevel(config.logLevel);
        const args = parseArguments(argv, config.defaults);

        if (args.help) {
            io.stdout(USAGE);
            return 0;
        }
        if (args.version) {
            io.stdout(`lsmp3 ${CLI_VERSION}\n`);
            return 0;
        }

        const sort = { sortBy: args.sortBy, reverse: args.reverse };
        const results = await withLogTiming(
            log,
            "listing",
            () =>
                listPaths(args.files, {
                    ...sort,
                    recursive: args.recursive,
                    defaultPath: options.defaultPath ?? ".",
                    tagExtractor: options.tagExtractor,
                }),
            { paths: args.files.length, recursive: args.recursive }
        );

        const groups = groupResults(results, sort);
        io.stdout(
            args.format === "json"
                ? renderJsonOutput(groups)
                : renderTableOutput(groups)
        );
        return 0;
    } catch (error) {
        io.stderr(`error: ${capitalizeFirstLetter(describeError(error))}\n`);
        if (isRecoverable(error)) {
            io.stderr("\nFor more information try --help\n");
        }
        if (
            error instanceof AppError &&
            error.code === ErrorCode.INVALID_ARGUMENT
        ) {
            return 2;
        }
        return 1;
    }
}
