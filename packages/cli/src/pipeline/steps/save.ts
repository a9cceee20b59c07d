import { writeFile } from 'node:fs/promises';
import { IoError } from '@bank-report/core';
import type { PipelineStep } from '../types.js';
import { getReportPath } from '../../workspace/paths.js';
import { promptSave } from '../../utils/prompt.js';
import { log, success } from '../../utils/console.js';
import { errorMessage } from '../../utils/fs.js';

/**
 * Writes the report text to a file, UTF-8, newline-terminated.
 *
 * @throws IoError on any write failure
 */
export async function writeReportFile(path: string, reportText: string): Promise<void> {
    try {
        await writeFile(path, `${reportText}\n`, 'utf8');
    } catch (err) {
        throw new IoError(errorMessage(err), path, { cause: err });
    }
}

/**
 * Step 4: Save
 * Asks whether to persist the report. A write failure is reported
 * but leaves the console report as printed.
 */
export const saveReport: PipelineStep = async (state) => {
    if (state.reportText === undefined) {
        return state;
    }

    log('');
    const shouldSave = await promptSave('¿Desea guardar el reporte en un archivo?', state.options);
    if (!shouldSave) {
        return state;
    }

    const outputPath = getReportPath(state.inputPath, state.config.report_suffix);
    try {
        await writeReportFile(outputPath, state.reportText);
        log('');
        success(`Reporte guardado exitosamente en '${outputPath}'`);
    } catch (err) {
        state.errors.push({
            step: 'save',
            message: `Error al guardar el reporte: ${errorMessage(err)}`,
            fatal: false,
            error: err,
        });
    }

    return state;
};
