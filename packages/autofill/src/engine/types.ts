import type { AppliedMapping, FieldMapping } from '../mapping/types.js';

export type FillMode = 'html' | 'pdf';

export type FillStrategyName = 'strict_template' | 'heuristic_fallback';

export interface FillArtifacts {
  screenshot: string;
  dom_snapshot: string;
  filled_document: string;
}

export interface FillResult {
  mode: FillMode;
  /** First adapter tried, or `unknown` when none ran. */
  adapter: string;
  attempted_adapters: string[];
  filled_fields: string[];
  applied_mappings: AppliedMapping[];
  warnings: string[];
  target_url: string;
  artifacts: FillArtifacts;
}

export interface FillOptions {
  explicitMappings?: FieldMapping[];
  /** Strict mode applies explicit mappings only. */
  strict?: boolean;
}

export function emptyArtifacts(): FillArtifacts {
  return { screenshot: '', dom_snapshot: '', filled_document: '' };
}
