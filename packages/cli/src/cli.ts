import { reportFile } from './commands/report.js';
import { parseArgs, printUsage } from './args.js';

/**
 * Runs the CLI for the given argv (without node and script path).
 * Resolves to the process exit code.
 */
export async function run(args: string[]): Promise<number> {
    const { inputPath, options } = parseArgs(args);

    if (inputPath === undefined) {
        printUsage();
        return 0;
    }

    return reportFile(inputPath, options);
}
