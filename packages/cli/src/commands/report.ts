import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveConfig } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { error, log } from '../utils/console.js';
import { errorMessage } from '../utils/fs.js';
import type { ReportOptions, ResolvedConfig } from '../types.js';
import type { PipelineState } from '../pipeline/types.js';

/**
 * Runs the report for one CSV file.
 *
 * @returns process exit code: 0 on success, 1 if loading, configuration
 *          or saving failed
 */
export async function reportFile(inputPath: string, options: ReportOptions): Promise<number> {
    // 1. Workspace config (optional)
    let resolved: ResolvedConfig;
    try {
        resolved = resolveConfig(options.workspace ?? detectWorkspaceRoot());
    } catch (err) {
        error(`Configuración inválida: ${errorMessage(err)}`);
        return 1;
    }

    // 2. Run Pipeline
    const state = await runPipeline(inputPath, resolved.config, options);

    // 3. Report errors
    return reportErrors(state);
}

function reportErrors(state: PipelineState): number {
    for (const e of state.errors) {
        if (e.step === 'save') {
            log(e.message);
        } else {
            error(e.message);
        }
    }
    return state.errors.length > 0 ? 1 : 0;
}
