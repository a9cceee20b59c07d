/**
 * Bank Report CLI - Core Types
 */

import type { ReportConfig } from '@bank-report/shared';

export interface ReportOptions {
    yes: boolean;
    workspace?: string;
}

export interface WorkspaceConfig {
    reportConfigPath: string;
}

export interface Workspace {
    root: string;
    config: WorkspaceConfig;
}

/**
 * Settings in effect for one run: workspace config or defaults.
 */
export interface ResolvedConfig {
    source: string | null;
    config: ReportConfig;
}
