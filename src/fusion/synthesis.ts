/**
 * Prompt assembly for the optional narrative synthesis.
 */

import type { ConflictRecord, CoverageGap, RankedItem, SourceCitation } from '../types/models.js';
import { allCitations } from './deduplicate.js';

export interface SynthesisPrompt {
  system: string;
  user: string;
}

export interface SynthesisContext {
  queryText: string;
  items: readonly RankedItem[];
  conflicts: readonly ConflictRecord[];
  gaps: readonly CoverageGap[];
  topN: number;
  maxWords: number;
}

export function buildSynthesisPrompt(ctx: SynthesisContext): SynthesisPrompt {
  const system = [
    'You answer questions using only the numbered sources provided.',
    'Cite sources inline as [n].',
    'Where sources disagree and the conflict is unresolved, say so and present both claims.',
    'If some domains could not be searched, say that the answer may be incomplete.',
    `Answer in at most ${ctx.maxWords} words.`,
  ].join(' ');

  const sources = ctx.items.slice(0, ctx.topN).map((item, i) => {
    const [primary, ...corroborating] = allCitations(item);
    const header = `[${i + 1}] domain=${item.sourceDomainId} score=${item.rankScore.toFixed(3)} source=${location(primary)} at ${primary.timestamp.toISOString()}`;
    const lines = [header];
    if (corroborating.length > 0) {
      lines.push(`Corroborated by: ${corroborating.map((c) => `${c.domainId}:${location(c)}`).join(', ')}`);
    }
    lines.push(item.content);
    return lines.join('\n');
  });

  const sections = [`Question: ${ctx.queryText}`, '', 'Sources:', sources.length ? sources.join('\n\n') : '(none)'];

  const unresolved = ctx.conflicts.filter((c) => c.resolvedTo === null);
  if (unresolved.length > 0) {
    sections.push('', 'Unresolved conflicts:');
    for (const conflict of unresolved) {
      sections.push(`- ${conflict.items.map((i) => i.citation.sourcePath || i.chunkId).join(' vs ')} (${conflict.kinds.join(', ')})`);
    }
  }

  if (ctx.gaps.length > 0) {
    sections.push('', 'Domains not searched:');
    for (const gap of ctx.gaps) {
      sections.push(`- ${gap.domainId}: ${gap.reason}`);
    }
  }

  return { system, user: sections.join('\n') };
}

function location(c: SourceCitation): string {
  return c.lineRange ? `${c.sourcePath}:${c.lineRange[0]}-${c.lineRange[1]}` : c.sourcePath;
}
