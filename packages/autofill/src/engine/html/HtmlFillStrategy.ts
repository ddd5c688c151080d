/**
 * Interactive-page fill strategy.
 *
 * 1. Explicit/template mappings (text, select, rule-driven checkbox/radio)
 * 2. Site adapters, heuristic mode only; a failing adapter is logged and skipped
 * 3. Date-picker dismissal
 * 4. Debug artifacts when enabled
 */

import type { Page } from 'playwright-core';
import { ArtifactWriter } from '../../artifacts/ArtifactWriter.js';
import { inferProvinceFromPostalCode } from '../../canonical/normalizers.js';
import type { ApplicantPayload } from '../../canonical/payload.js';
import { buildCanonicalFieldMap } from '../../canonical/valueMap.js';
import { isCanonicalFieldKey, type CanonicalFieldMap } from '../../canonical/vocabulary.js';
import { isDebugCaptureEnabled, shouldSaveScreenshots } from '../../config/env.js';
import { AdapterFailure } from '../../errors.js';
import { buildRuleContext, evalCheckedWhen } from '../../mapping/checkedWhen.js';
import { isCheckKind, type AppliedMapping, type AppliedReason, type FieldMapping } from '../../mapping/types.js';
import { getLogger } from '../../monitoring/logger.js';
import { emptyArtifacts, type FillOptions, type FillResult } from '../types.js';
import { FilledFields, pickHtmlAdapters } from './adapters/index.js';
import { dismissOpenDatepicker } from './datepicker.js';
import { selectIfPossible, setCheckIfPossible, setIfPossible } from './fieldWriters.js';

/**
 * Apply explicit mappings in order and return one audit entry per control
 * actually written.
 */
export async function applyExplicitMappings(
  page: Page,
  values: CanonicalFieldMap,
  filled: FilledFields,
  mappings: FieldMapping[],
): Promise<AppliedMapping[]> {
  const applied: AppliedMapping[] = [];
  const context = buildRuleContext(values);

  for (const item of mappings) {
    const selector = item.selector.trim();
    const key = item.canonical_key.trim();
    if (!selector) continue;

    let ok = false;
    let reason: AppliedReason = 'rule_evaluated_true';

    if (isCheckKind(item.field_kind)) {
      const result = evalCheckedWhen(item.checked_when, context);
      if (result === null) continue;
      const expected = result && item.match_value.trim() !== '';
      ok = await setCheckIfPossible(page, [selector], expected);
      reason = expected ? 'rule_evaluated_true' : 'rule_evaluated_false';
    } else {
      if (!isCanonicalFieldKey(key)) continue;
      const value = values[key];
      if (!value) continue;
      if (item.field_kind === 'select') {
        ok = await selectIfPossible(page, [selector], value);
        if (!ok && key === 'provincia') {
          const inferred = inferProvinceFromPostalCode(values.cp);
          if (inferred) {
            ok = await selectIfPossible(page, [selector], inferred);
            if (ok) reason = 'cp_inferred_fallback';
          }
        }
      } else {
        ok = (await selectIfPossible(page, [selector], value)) || (await setIfPossible(page, [selector], value));
      }
    }

    if (ok) {
      filled.add(key);
      applied.push({
        selector,
        canonical_key: key,
        field_kind: item.field_kind,
        source: item.source || 'manual',
        confidence: item.confidence,
        reason,
      });
    }
  }
  return applied;
}

export async function fillHtmlPage(
  page: Page,
  payload: ApplicantPayload,
  outDir: string,
  opts: FillOptions = {},
): Promise<FillResult> {
  const values = buildCanonicalFieldMap(payload);
  const log = getLogger().child({ component: 'HtmlFillStrategy' });
  const filled = new FilledFields();
  const attempted: string[] = [];

  const applied = await applyExplicitMappings(page, values, filled, opts.explicitMappings ?? []);

  if (!opts.strict) {
    for (const adapter of pickHtmlAdapters(page.url())) {
      attempted.push(adapter.name);
      try {
        await adapter.apply(page, values, filled, payload);
      } catch (err) {
        const failure = new AdapterFailure(adapter.name, err);
        log.error(failure.message, { adapter: adapter.name });
      }
    }
  }

  await dismissOpenDatepicker(page);

  const artifacts = emptyArtifacts();
  const writer = new ArtifactWriter(outDir);
  if (shouldSaveScreenshots()) {
    artifacts.screenshot = await writer.saveScreenshot(page, 'target_html_autofill');
  }
  if (isDebugCaptureEnabled()) {
    artifacts.dom_snapshot = await writer.saveHtmlSnapshot(page, 'target_html_autofill');
  }

  log.info('Interactive page filled', {
    filled: filled.toArray().length,
    explicit: applied.length,
    adapters: attempted,
  });

  return {
    mode: 'html',
    adapter: attempted[0] ?? 'unknown',
    attempted_adapters: attempted,
    filled_fields: filled.toArray(),
    applied_mappings: applied,
    warnings: [],
    target_url: page.url(),
    artifacts,
  };
}
