import { countIn } from './extract.js';
import {
  VIEW_KINDS,
  type ChangeReport,
  type Inconsistency,
  type NameUniverse,
  type RenamePlan
} from './types.js';

export function formatMateReport(universe: NameUniverse, diagnostics: Inconsistency[]): string {
  const output = [`MATE NAMES (${universe.names.length} unique):`, '='.repeat(40)];

  universe.names.forEach((name, index) => {
    const counts = VIEW_KINDS.map((kind) =>
      universe.views[kind] ? `${kind}=${countIn(universe, kind, name)}` : `${kind}=n/a`
    );
    output.push(`${String(index + 1).padStart(2)}. ${name} (${counts.join(', ')})`);
  });

  output.push('', 'File breakdown:');
  for (const kind of VIEW_KINDS) {
    const view = universe.views[kind];
    if (!view) {
      output.push(`  ${kind}: n/a`);
      continue;
    }
    output.push(`  ${kind}: ${view.occurrences.length} mate(s)`);
    if (view.occurrences.length > 0) {
      output.push(`    ${view.occurrences.map((occurrence) => occurrence.name).join(', ')}`);
    }
  }

  if (diagnostics.length > 0) {
    output.push('', 'Issues:');
    for (const issue of diagnostics) output.push(`  - ${formatInconsistency(issue)}`);
  }

  return output.join('\n');
}

export function formatInconsistency(issue: Inconsistency): string {
  switch (issue.type) {
    case 'intra-view-duplication':
      return `"${issue.name}" appears ${issue.count} times in ${issue.view}`;
    case 'cross-view-absence':
      return `"${issue.name}" is missing from ${issue.missingFrom.join(', ')}`;
    case 'count-mismatch': {
      const counts = Object.entries(issue.counts)
        .map(([kind, count]) => `${kind}=${count}`)
        .join(', ');
      return `"${issue.name}" has different counts: ${counts}`;
    }
    case 'document-unavailable':
      return `${issue.view} document unavailable: ${issue.reason}`;
  }
}

export function formatRenamePlan(plan: RenamePlan): string {
  const output = plan.entries.map(
    (entry) => `  '${entry.from}' -> '${entry.to}' (${entry.instances} instances)`
  );
  output.push(`Total instances to be renamed: ${plan.totalInstances}`);
  return output.join('\n');
}

export function formatChangeReport(report: ChangeReport): string {
  const output = [`Renamed ${report.total} instance(s):`];
  for (const entry of report.renames) {
    const counts = VIEW_KINDS.map((kind) => `${kind}=${entry.counts[kind]}`).join(', ');
    output.push(`  '${entry.from}' -> '${entry.to}': ${counts}`);
  }
  if (report.zeroEffect.length > 0) {
    output.push(`No live occurrences for: ${report.zeroEffect.join(', ')}`);
  }
  return output.join('\n');
}
