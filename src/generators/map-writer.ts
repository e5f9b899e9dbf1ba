import type { MappingRecord } from 'types';

export interface MapWriterOptions {
  comment?: string;
}

function section(name: string, lines: string[]): string[] {
  if (lines.length === 0) return [];
  return ['', name, '', ...lines];
}

/**
 * Render a mapping record in the line-oriented correspondence format read by
 * the reaction engine: count header, then one section per id list.
 */
export function writeMapFile(record: MappingRecord, options: MapWriterOptions = {}): string {
  const comment = options.comment ?? 'Reaction map generated by reactmap';
  const equivalences: string[] = [];
  for (const entry of record.entries) {
    if (entry.kind === 'pair') equivalences.push(`${entry.preId}\t${entry.postId}`);
  }

  const header = [`# ${comment}`, '', `${equivalences.length} equivalences`];
  if (record.edgeIds.length > 0) header.push(`${record.edgeIds.length} edgeIDs`);
  if (record.deleteIds.length > 0) header.push(`${record.deleteIds.length} deleteIDs`);
  if (record.createIds.length > 0) header.push(`${record.createIds.length} createIDs`);

  const lines = [
    ...header,
    ...section('InitiatorIDs', record.initiatorIds.map(String)),
    ...section('EdgeIDs', record.edgeIds.map(String)),
    ...section('DeleteIDs', record.deleteIds.map(String)),
    ...section('CreateIDs', record.createIds.map(String)),
    ...section('Equivalences', equivalences),
  ];

  return lines.join('\n') + '\n';
}
