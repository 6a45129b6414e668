export interface CliOptions {
    configPath?: string;
    append: boolean;
}

interface ArgSpec {
    usage: string;
    allowAppend: boolean;
}

function printHelp({ usage, allowAppend }: ArgSpec): void {
    const lines = [
        `Usage: ${usage}`,
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in the project root).",
        ...(allowAppend ? ["      --append   Keep the existing collection and add to it instead of rebuilding it."] : []),
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

export function parseArgs(argv: string[], spec: ArgSpec): CliOptions {
    let configPath: string | undefined;
    let append = false;

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            printHelp(spec);
            process.exit(0);
        }

        if (arg === "-c" || arg === "--config") {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith("-")) {
                throw new Error(`Option "${arg}" expects a path to an environment file.`);
            }
            configPath = value;
            i += 1;
            continue;
        }

        if (arg === "--append" && spec.allowAppend) {
            append = true;
            continue;
        }

        if (arg.startsWith("-")) {
            throw new Error(`Unknown option "${arg}". Run with --help for usage.`);
        }

        if (!configPath) {
            configPath = arg;
        }
    }

    return { configPath, append };
}
