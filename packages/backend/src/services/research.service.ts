import type { ProtocolReport } from '@protocol-scout/shared';
import { config } from '../config.js';
import { fetchProtocolDetail } from './defillama.service.js';
import { findHacksForProtocol } from './hacks.service.js';
import { getAllHacks, resolveProtocolName } from './registry.service.js';
import { buildReport } from './report.service.js';
import { log } from '../logger.js';

export interface RunReportOptions {
  days?: number;
  now?: Date;
}

/** Resolve a user-typed protocol name and assemble its research report. */
export async function runReport(
  protocol: string,
  { days = config.report.defaultDays, now }: RunReportOptions = {},
): Promise<ProtocolReport> {
  log.info('report', `Resolving "${protocol}"...`);
  const meta = await resolveProtocolName(protocol);
  log.info('report', `Resolved to ${meta.isParent ? 'parent ' : ''}${meta.slug}`);

  const [detail, hacks] = await Promise.all([fetchProtocolDetail(meta.slug), getAllHacks()]);
  const matched = findHacksForProtocol(hacks, meta.name, meta.children.map(c => c.name));
  log.info('report', `${matched.length} hack record(s) for ${meta.name}`);

  return buildReport(detail, meta, matched, { tvlHistoryDays: days, now });
}
