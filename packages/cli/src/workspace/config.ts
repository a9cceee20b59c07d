import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { ReportConfigSchema, type ReportConfig } from '@bank-report/shared';
import { resolveWorkspace } from './paths.js';
import type { Workspace, ResolvedConfig } from '../types.js';

/**
 * Loads config/report.yaml from the workspace.
 * An absent or empty file yields the defaults.
 */
export function loadReportConfig(workspace: Workspace): ReportConfig {
    const path = workspace.config.reportConfigPath;
    if (!existsSync(path)) {
        return ReportConfigSchema.parse({});
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    return ReportConfigSchema.parse(data ?? {});
}

/**
 * Resolves the settings in effect for a run.
 * Without a workspace root the defaults apply.
 */
export function resolveConfig(root: string | null): ResolvedConfig {
    if (!root) {
        return { source: null, config: ReportConfigSchema.parse({}) };
    }
    const workspace = resolveWorkspace(root);
    return {
        source: workspace.config.reportConfigPath,
        config: loadReportConfig(workspace),
    };
}
