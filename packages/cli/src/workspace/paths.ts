import { basename, dirname, join } from 'node:path';
import { REPORT_DEFAULTS } from '@bank-report/shared';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        config: {
            reportConfigPath: join(root, 'config', 'report.yaml'),
        },
    };
}

/**
 * Derives the report file path from the input path: same directory,
 * input file name up to its first period, then the suffix.
 *
 * @example getReportPath('data/movimientos.csv') // 'data/movimientos_reporte.txt'
 */
export function getReportPath(inputPath: string, suffix: string = REPORT_DEFAULTS.REPORT_SUFFIX): string {
    const stem = basename(inputPath).split('.')[0];
    return join(dirname(inputPath), `${stem}${suffix}`);
}
